import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { Command } from "commander";
import { z } from "zod";
import { ApiRequestError } from "../../errors";
import { getLog, logError } from "../logger";
import { continueYn } from "../prompt";
import { CliDependencies, connectTargets, isRecord, loadProject, TargetOptions } from "./context";

export interface PullOptions extends TargetOptions {
  allowUncommitted: boolean;
}

const pulledDocumentSchema = z.object({
  _version_label: z.string(),
  _content: z.string()
});

/** Returns the mapped files written for each target, or null when the working tree was not clean. */
export async function runPull(deps: CliDependencies, options: PullOptions): Promise<Record<string, string[]> | null> {
  const project = await loadProject(deps, options);
  const log = getLog("pull");
  const connections = await connectTargets(deps, project, options);

  if (deps.git.hasUncommittedChanges() && !options.allowUncommitted) {
    log.error("Git has uncommitted changes, please commit and try again, or use --allow-uncommitted flag.");
    return null;
  }

  const written: Record<string, string[]> = {};

  for (const { target, api } of connections) {
    if (!(await continueYn(deps.prompter, `Overwriting mapped files with documents from ${target}.`))) {
      continue;
    }

    const profiles = project.fileMap.documentProfiles(target);

    let response: unknown = null;
    try {
      response = await api.postJson("pull", { doc_ids: Object.values(profiles) });
    } catch (error) {
      if (!(error instanceof ApiRequestError)) {
        throw error;
      }
      logError(log, error, `Error pulling files from endpoint ${api.url}`);
    }

    if (!isRecord(response)) {
      log.error(`No response from target: ${target}`);
      continue;
    }

    written[target] = [];
    for (const [fileName, docId] of Object.entries(profiles)) {
      const document = pulledDocumentSchema.safeParse(response[docId]);
      if (!document.success) {
        log.warn(`No current version of ${fileName} (${docId}) on ${target}`);
        continue;
      }

      const filePath = path.join(project.topLevelDir, fileName);
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(filePath, Buffer.from(document.data._content, "base64"));
      written[target].push(fileName);
      log.info(`Updated ${fileName} to version ${document.data._version_label} from ${target}`);
    }
  }

  return written;
}

export function registerPullCommand(program: Command, deps: CliDependencies): void {
  program
    .command("pull")
    .description("Overwrite the mapped files with their current versions in the document repository")
    .requiredOption("-t, --targets <names...>", "one or more configured target names")
    .option("-u, --username <username>", "username for the document repository")
    .option("-p, --password <password>", "password; may persist in shell history")
    .option("-a, --allow-uncommitted", "allow overwriting files with uncommitted changes", false)
    .option("-c, --config <path>", "configuration file")
    .action(async (options: PullOptions) => {
      if (!(await runPull(deps, options))) {
        process.exitCode = 1;
      }
    });
}
