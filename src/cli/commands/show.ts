import { Command } from "commander";
import { ApiRequestError } from "../../errors";
import { getLog, logError } from "../logger";
import { CliDependencies, connectTargets, isRecord, loadProject, remapToFileNames, TargetOptions } from "./context";

export interface ShowOptions extends TargetOptions {
  checkSynced: boolean;
}

/** Indented JSON with the punctuation stripped, one key per line. */
export function formatForDisplay(value: unknown): string {
  return JSON.stringify(value, null, 4)
    .replace(/\\"/g, "")
    .replace(/[[\]{}"]/g, "")
    .replace(/,\n/g, "\n")
    .split("\n")
    .map((line) => line.replace(/^ {4}/, "").trimEnd())
    .filter((line) => line.length > 0)
    .join("\n");
}

/** Reads the commit recorded in a check-in comment, if the comment is client data. */
export function checkedInSha(comment: unknown): string | undefined {
  if (typeof comment !== "string") {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(comment);
    return isRecord(parsed) && typeof parsed.current_sha_hash === "string" ? parsed.current_sha_hash : undefined;
  } catch (error) {
    if (error instanceof SyntaxError) {
      return undefined;
    }
    throw error;
  }
}

export function markSynced(versions: Record<string, unknown>, headSha: string): Record<string, unknown> {
  const marked: Record<string, unknown> = {};
  for (const [fileName, version] of Object.entries(versions)) {
    marked[fileName] = isRecord(version)
      ? { ...version, _synced: checkedInSha(version._checked_in_comment) === headSha }
      : version;
  }
  return marked;
}

export async function runShow(deps: CliDependencies, options: ShowOptions): Promise<Record<string, unknown>> {
  const project = await loadProject(deps, options);
  const log = getLog("show");
  const connections = await connectTargets(deps, project, options);
  const headSha = options.checkSynced ? deps.git.headSha() : undefined;
  const responses: Record<string, unknown> = {};

  for (const { target, api } of connections) {
    const docIds = Object.values(project.fileMap.documentProfiles(target));

    let response: unknown = null;
    try {
      response = await api.getJson("show", { docId: docIds });
    } catch (error) {
      if (!(error instanceof ApiRequestError)) {
        throw error;
      }
      logError(log, error, `Error getting most recent versions from ${api.url}`);
    }

    if (!isRecord(response) || Object.keys(response).length === 0) {
      log.error(`No response from target: ${target}`);
      continue;
    }

    const versions = remapToFileNames(project.fileMap, target, response);
    responses[target] = headSha === undefined ? versions : markSynced(versions, headSha);
  }

  if (Object.keys(responses).length > 0) {
    deps.print(formatForDisplay(responses));
  }

  return responses;
}

export function registerShowCommand(program: Command, deps: CliDependencies): void {
  program
    .command("show")
    .description("Show the current document versions of all mapped files")
    .requiredOption("-t, --targets <names...>", "one or more configured target names")
    .option("-u, --username <username>", "username for the document repository")
    .option("-p, --password <password>", "password; may persist in shell history")
    .option("--check-synced", "check the current versions come from the checked-out commit", false)
    .option("-c, --config <path>", "configuration file")
    .action(async (options: ShowOptions) => {
      await runShow(deps, options);
    });
}
