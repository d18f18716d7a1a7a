import { existsSync, statSync } from "fs";
import path from "path";
import { Command } from "commander";
import { FileMapError } from "../../errors";
import { getTargetConfig } from "../config";
import { getLog } from "../logger";
import { CliDependencies, ConfigOption, loadProject } from "./context";

export interface MapOptions extends ConfigOption {
  target: string;
  docId?: string;
}

/** Path of a file relative to the top-level directory, with forward slashes. */
export function toMappedPath(topLevelDir: string, cwd: string, file: string): string {
  const relative = path.relative(topLevelDir, path.resolve(cwd, file));
  if (!relative || relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new FileMapError(`${file} is not inside the git top-level directory ${topLevelDir}`);
  }

  return relative.split(path.sep).join("/");
}

export async function runMap(deps: CliDependencies, file: string, options: MapOptions): Promise<void> {
  const project = await loadProject(deps, options, { allowMissingMap: true });
  const log = getLog("map");
  getTargetConfig(project.config, options.target);

  const fileName = toMappedPath(project.topLevelDir, deps.cwd, file);
  const filePath = path.join(project.topLevelDir, fileName);
  if (!existsSync(filePath) || !statSync(filePath).isFile()) {
    throw new FileMapError(`File ${fileName} does not exist on disk.`);
  }

  const docId = (options.docId ?? (await deps.prompter.ask(`Document id for ${fileName} on ${options.target}: `))).trim();
  if (!docId) {
    throw new FileMapError("A document id is required");
  }

  const previous = project.fileMap.setDocumentProfile(options.target, fileName, docId);
  await project.fileMap.save();

  if (previous === undefined) {
    log.info(`Mapped ${fileName} to ${docId} on ${options.target}`);
  } else if (previous !== docId) {
    log.info(`Remapped ${fileName} from ${previous} to ${docId} on ${options.target}`);
  } else {
    log.info(`${fileName} was already mapped to ${docId} on ${options.target}`);
  }
}

export function registerMapCommand(program: Command, deps: CliDependencies): void {
  program
    .command("map")
    .description("Add or update the document id a file is mapped to")
    .argument("<file>", "file inside the git working tree")
    .requiredOption("-t, --target <name>", "configured target name")
    .option("-d, --doc-id <id>", "document id; prompted for when missing")
    .option("-c, --config <path>", "configuration file")
    .action(async (file: string, options: MapOptions) => {
      await runMap(deps, file, options);
    });
}
