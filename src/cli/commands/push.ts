import { cp, readdir, rm, writeFile } from "fs/promises";
import path from "path";
import { Command, Option } from "commander";
import { ApiRequestError } from "../../errors";
import { FileMap } from "../fileMap";
import { getLog, logError } from "../logger";
import { continueYn } from "../prompt";
import {
  CliDependencies,
  connectTargets,
  isRecord,
  loadProject,
  remapToFileNames,
  TargetOptions
} from "./context";

export type VersionType = "major" | "minor";

export interface PushOptions extends TargetOptions {
  allowUncommitted: boolean;
  version: VersionType;
}

export interface ClientData {
  current_branch: string;
  current_sha_hash: string;
  current_commit_msg: string;
  version_type: VersionType;
}

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/** Local time as YYYYMMDDTHHMMSS. */
export function formatTagTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `T${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function buildTagName(command: string, targets: string[], date: Date): string {
  return `${command}.${targets.join("-")}.${formatTagTimestamp(date)}`;
}

export function collectClientData(deps: CliDependencies, version: VersionType): ClientData {
  return {
    current_branch: deps.git.currentBranch(),
    current_sha_hash: deps.git.headSha(),
    current_commit_msg: deps.git.lastCommitMessage(),
    version_type: version
  };
}

/**
 * Replaces the target module directory with the local copy and drops a
 * `<sha>.commit` file describing the pushed commit.
 */
export async function copyModuleFiles(fileMap: FileMap, target: string, clientData: ClientData): Promise<void> {
  const log = getLog("push");
  const targetDir = fileMap.targetModulePath(target);
  const sourceDir = fileMap.localModulePath(target);
  if (!targetDir || !sourceDir) {
    log.info("No modules to copy: `_module_directory` file map key was null");
    return;
  }

  for (const entry of await readdir(targetDir)) {
    await rm(path.join(targetDir, entry), { recursive: true, force: true });
    log.debug(`Removed ${entry} from ${target}`);
  }

  for (const entry of await readdir(sourceDir)) {
    await cp(path.join(sourceDir, entry), path.join(targetDir, entry), { recursive: true, preserveTimestamps: true });
    log.debug(`Copied ${entry} to ${target}`);
  }

  await writeFile(
    path.join(targetDir, `${clientData.current_sha_hash}.commit`),
    JSON.stringify(clientData, null, 4),
    "utf8"
  );
  log.debug(`Created .commit file in ${target}`);
}

/** Returns false when nothing was pushed because the working tree is not clean. */
export async function runPush(deps: CliDependencies, options: PushOptions): Promise<boolean> {
  const project = await loadProject(deps, options);
  const log = getLog("push");
  const connections = await connectTargets(deps, project, options);
  log.debug(`Executing push command with connections ${options.targets.join(", ")}`);

  if (deps.git.hasUncommittedChanges() && !options.allowUncommitted) {
    log.error("Git has uncommitted changes, please commit and try again, or use --allow-uncommitted flag.");
    return false;
  }

  const clientData = collectClientData(deps, options.version);
  const responses: Record<string, unknown> = {};

  for (const { target, api } of connections) {
    if (!(await continueYn(deps.prompter, `Sending files to ${target}.`))) {
      continue;
    }

    let response: unknown = null;
    try {
      const files = await project.fileMap.readMappedFiles(target);
      response = await api.postFiles(
        "push",
        files.map((file) => ({
          field: file.docId,
          fileName: file.fileName,
          contentType: "text/plain",
          content: file.content
        })),
        { client_data: JSON.stringify(clientData) }
      );
    } catch (error) {
      if (!(error instanceof ApiRequestError)) {
        throw error;
      }
      logError(log, error, `Error pushing files to endpoint ${api.url}`);
    }

    if (!response || (isRecord(response) && Object.keys(response).length === 0)) {
      log.error(`No response from target: ${target}`);
      continue;
    }

    try {
      await copyModuleFiles(project.fileMap, target, clientData);
    } catch (error) {
      logError(log, error, `Error copying module files to ${target}`);
    }

    responses[target] = isRecord(response) ? remapToFileNames(project.fileMap, target, response) : response;
  }

  const answered = Object.keys(responses);
  if (answered.length === 0) {
    log.warn("No target accepted the push; no tag was created");
    return true;
  }

  const tagName = buildTagName("push", answered, deps.now());
  deps.git.createAnnotatedTag(tagName, JSON.stringify(responses, null, 4));
  log.info(`Created tag ${tagName}`);
  return true;
}

export function registerPushCommand(program: Command, deps: CliDependencies): void {
  program
    .command("push")
    .description("Push the files listed in the file map to the document repository")
    .requiredOption("-t, --targets <names...>", "one or more configured target names")
    .option("-u, --username <username>", "username recorded as checked-in-by on new versions")
    .option("-p, --password <password>", "password; may persist in shell history")
    .option("-a, --allow-uncommitted", "allow pushing with uncommitted changes", false)
    .addOption(
      new Option("-V, --version <type>", "version type stored in the document repository")
        .choices(["major", "minor"])
        .default("minor")
    )
    .option("-c, --config <path>", "configuration file")
    .action(async (options: PushOptions) => {
      if (!(await runPush(deps, options))) {
        process.exitCode = 1;
      }
    });
}
