import { existsSync, readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError } from "../errors";

export const CONFIG_FILENAME = ".gitdocrc.json";
export const DEFAULT_MAP_FILENAME = ".gitdocmap.json";

const targetSchema = z.object({
  url: z.string().url(),
  transactionNumber: z.union([z.string().min(1), z.number().int()]).transform(String)
});

const cliConfigSchema = z.object({
  mapFilename: z.string().min(1).default(DEFAULT_MAP_FILENAME),
  defaultUsername: z.string().optional(),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).optional(),
  targets: z
    .record(targetSchema)
    .refine((targets) => Object.keys(targets).length > 0, { message: "at least one target is required" })
});

export type TargetConfig = z.infer<typeof targetSchema>;
export type CliConfig = z.infer<typeof cliConfigSchema>;

export function resolveConfigPath(explicitPath: string | undefined, topLevelDir: string): string {
  const configured = explicitPath || process.env.GIT_DOC_MAPPER_CONFIG;
  if (configured) {
    return path.resolve(configured);
  }

  return path.join(topLevelDir, CONFIG_FILENAME);
}

export function parseCliConfig(raw: unknown, source: string): CliConfig {
  const parsed = cliConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration in ${source}: ${issues}`);
  }

  return parsed.data;
}

export function loadCliConfig(configPath: string): CliConfig {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Configuration file ${configPath} was not found`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf8"));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`Configuration file ${configPath} is not valid JSON: ${error.message}`);
    }
    throw error;
  }

  return parseCliConfig(raw, configPath);
}

export function getTargetConfig(config: CliConfig, target: string): TargetConfig {
  const targetConfig = Object.prototype.hasOwnProperty.call(config.targets, target)
    ? config.targets[target]
    : undefined;
  if (!targetConfig) {
    throw new ConfigError(
      `Unknown target [${target}]; configured targets: ${Object.keys(config.targets).join(", ")}`
    );
  }

  return targetConfig;
}
