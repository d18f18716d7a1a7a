import { ApiAdaptorOptions, DocumentApi } from "../apiAdaptor";
import { CliConfig, getTargetConfig, loadCliConfig, resolveConfigPath } from "../config";
import { FileMap } from "../fileMap";
import { GitClient } from "../git";
import { configureLogLevel, getLog } from "../logger";
import { Prompter } from "../prompt";

export interface CliDependencies {
  git: GitClient;
  prompter: Prompter;
  createApi(options: ApiAdaptorOptions): DocumentApi;
  now(): Date;
  cwd: string;
  print(text: string): void;
}

export interface ConfigOption {
  config?: string;
}

export interface TargetOptions extends ConfigOption {
  targets: string[];
  username?: string;
  password?: string;
}

export interface Project {
  config: CliConfig;
  fileMap: FileMap;
  topLevelDir: string;
}

export interface TargetConnection {
  target: string;
  api: DocumentApi;
}

export interface Credentials {
  username: string;
  password: string;
}

export async function loadProject(
  deps: CliDependencies,
  options: ConfigOption,
  { allowMissingMap = false }: { allowMissingMap?: boolean } = {}
): Promise<Project> {
  const topLevelDir = deps.git.topLevel();
  const config = loadCliConfig(resolveConfigPath(options.config, topLevelDir));
  configureLogLevel(config.logLevel);

  const fileMap = await FileMap.load(topLevelDir, config.mapFilename, {
    prompter: deps.prompter,
    allowMissing: allowMissingMap
  });

  return { config, fileMap, topLevelDir };
}

export async function resolveCredentials(
  deps: CliDependencies,
  config: CliConfig,
  options: Pick<TargetOptions, "username" | "password">
): Promise<Credentials> {
  const log = getLog("context");

  let username = options.username;
  if (!username && config.defaultUsername) {
    username = config.defaultUsername;
    log.info(`Using default username ${username} from configuration`);
  }
  if (!username) {
    username = await deps.prompter.ask("Enter your username: ");
  }

  const password =
    options.password || process.env.GIT_DOC_MAPPER_PASSWORD || (await deps.prompter.askSecret("Enter your password: "));

  return { username, password };
}

/** Checks every target against the configuration and the file map, then opens one API connection per target. */
export async function connectTargets(
  deps: CliDependencies,
  project: Project,
  options: TargetOptions
): Promise<TargetConnection[]> {
  const targetConfigs = options.targets.map((target) => ({ target, ...getTargetConfig(project.config, target) }));
  project.fileMap.requireTargets(options.targets);

  const credentials = await resolveCredentials(deps, project.config, options);

  return targetConfigs.map(({ target, url, transactionNumber }) => ({
    target,
    api: deps.createApi({ url, transactionNumber, ...credentials })
  }));
}

/** Rewrites document-id keys of a target answer into the mapped file names. */
export function remapToFileNames(
  fileMap: FileMap,
  target: string,
  response: Record<string, unknown>
): Record<string, unknown> {
  const remapped: Record<string, unknown> = {};
  for (const [docId, value] of Object.entries(response)) {
    remapped[fileMap.fileNameFor(target, docId) ?? docId] = value;
  }
  return remapped;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
