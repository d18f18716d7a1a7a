import { existsSync, statSync } from "fs";
import { readFile, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import { FileMapError } from "../errors";
import { getLog } from "./logger";
import { continueyN, Prompter } from "./prompt";

const targetMapSchema = z.object({
  _document_profiles: z.record(z.string()).default({}),
  _module_directory: z.string().nullable().default(null)
});

const documentMapSchema = z.object({
  _targets: z.record(targetMapSchema).default({})
});

export type TargetMap = z.infer<typeof targetMapSchema>;
export type DocumentMap = z.infer<typeof documentMapSchema>;

export interface MappedFile {
  docId: string;
  fileName: string;
  content: Buffer;
}

export interface LoadFileMapOptions {
  prompter: Prompter;
  /** Start from an empty map instead of offering the template. */
  allowMissing?: boolean;
}

function isFile(filePath: string): boolean {
  return existsSync(filePath) && statSync(filePath).isFile();
}

function isDirectory(dirPath: string): boolean {
  return existsSync(dirPath) && statSync(dirPath).isDirectory();
}

function hasOwn(record: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

export class FileMap {
  constructor(
    readonly topLevelDir: string,
    readonly filePath: string,
    private readonly data: DocumentMap
  ) {}

  static template(): DocumentMap {
    return {
      _targets: {
        "<target name>": {
          _document_profiles: {
            "<filename>": "<document profile id>"
          },
          _module_directory: "<module directory path>"
        }
      }
    };
  }

  static async load(topLevelDir: string, mapFilename: string, options: LoadFileMapOptions): Promise<FileMap> {
    const log = getLog("fileMap");
    const filePath = path.join(topLevelDir, mapFilename);

    if (!isFile(filePath)) {
      if (options.allowMissing) {
        log.debug(`No file map at ${filePath}; starting an empty one`);
        return new FileMap(topLevelDir, filePath, { _targets: {} });
      }
      return FileMap.createTemplate(filePath, options.prompter);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(filePath, "utf8"));
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new FileMapError(`File map ${filePath} is not valid JSON: ${error.message}`);
      }
      throw error;
    }

    const parsed = documentMapSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      throw new FileMapError(`File map ${filePath} has an invalid shape: ${issues}`);
    }

    log.debug(`Loaded file map at ${filePath}`);
    const fileMap = new FileMap(topLevelDir, filePath, parsed.data);
    fileMap.validate();
    return fileMap;
  }

  private static async createTemplate(filePath: string, prompter: Prompter): Promise<never> {
    if (await continueyN(prompter, `Creating new file map at ${filePath}.`)) {
      await writeFile(filePath, JSON.stringify(FileMap.template(), null, 4), "utf8");
      throw new FileMapError(`Initialize keys and values in new template file map created at ${filePath}`);
    }

    throw new FileMapError(`Create a file map at ${filePath} before continuing.`);
  }

  targets(): string[] {
    return Object.keys(this.data._targets);
  }

  requireTargets(targets: string[]): void {
    const missing = targets.filter((target) => !hasOwn(this.data._targets, target));
    if (missing.length > 0) {
      throw new FileMapError(`File map is missing targets: ${missing.join(", ")}`);
    }
  }

  documentProfiles(target: string): Record<string, string> {
    return { ...this.targetMap(target)._document_profiles };
  }

  moduleDirectory(target: string): string | null {
    return this.targetMap(target)._module_directory;
  }

  /** Resolves the configured module directory relative to the top-level directory. */
  targetModulePath(target: string): string | null {
    const dirname = this.moduleDirectory(target);
    return dirname ? path.resolve(this.topLevelDir, dirname) : null;
  }

  /** The local copy of a module directory lives at the top level under the same base name. */
  localModulePath(target: string): string | null {
    const dirname = this.moduleDirectory(target);
    return dirname ? path.join(this.topLevelDir, path.basename(dirname)) : null;
  }

  fileNameFor(target: string, docId: string): string | undefined {
    const profiles = this.targetMap(target)._document_profiles;
    return Object.keys(profiles).find((fileName) => profiles[fileName] === docId);
  }

  async readMappedFiles(target: string): Promise<MappedFile[]> {
    const log = getLog("fileMap");
    const files: MappedFile[] = [];

    for (const [fileName, docId] of Object.entries(this.targetMap(target)._document_profiles)) {
      const filePath = path.join(this.topLevelDir, fileName);
      try {
        files.push({ docId, fileName, content: await readFile(filePath) });
        log.info(`Added file: ${filePath}`);
      } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
          log.error(`File was not found: ${filePath}`);
          continue;
        }
        throw error;
      }
    }

    return files;
  }

  /**
   * Maps a file to a document id, creating the target entry when needed.
   * Returns the document id the file was mapped to before, if any.
   */
  setDocumentProfile(target: string, fileName: string, docId: string): string | undefined {
    if (!hasOwn(this.data._targets, target)) {
      this.data._targets[target] = { _document_profiles: {}, _module_directory: null };
    }

    const profiles = this.data._targets[target]._document_profiles;
    const owner = this.fileNameFor(target, docId);
    if (owner !== undefined && owner !== fileName) {
      throw new FileMapError(`Document id ${docId} is already mapped to ${owner} on target ${target}`);
    }

    const previous = hasOwn(profiles, fileName) ? profiles[fileName] : undefined;
    profiles[fileName] = docId;
    return previous;
  }

  async save(): Promise<void> {
    await writeFile(this.filePath, `${JSON.stringify(this.data, null, 4)}\n`, "utf8");
  }

  validate(): void {
    const log = getLog("fileMap");

    for (const [target, targetMap] of Object.entries(this.data._targets)) {
      const seen = new Map<string, string>();
      for (const [fileName, docId] of Object.entries(targetMap._document_profiles)) {
        if (!isFile(path.join(this.topLevelDir, fileName))) {
          throw new FileMapError(
            `File ${fileName} is in document profiles for target ${target} but does not exist on disk.`
          );
        }

        const owner = seen.get(docId);
        if (owner !== undefined) {
          throw new FileMapError(`Document id ${docId} is mapped to both ${owner} and ${fileName} on target ${target}`);
        }
        seen.set(docId, fileName);
      }
      log.debug(`Validated all document profiles for ${target}`);

      const targetDir = this.targetModulePath(target);
      const localDir = this.localModulePath(target);
      if (targetDir && localDir) {
        if (!isDirectory(targetDir)) {
          throw new FileMapError(`Module directory \`${targetDir}\` does not exist or is not a directory on ${target}`);
        }
        if (!isDirectory(localDir)) {
          throw new FileMapError(
            `Module directory \`${localDir}\` does not exist or is not a directory in local git top-level directory`
          );
        }
        log.debug(`Validated ${target} module directories at \`${targetDir}\` and \`${localDir}\``);
      }
    }
  }

  toJSON(): DocumentMap {
    return this.data;
  }

  private targetMap(target: string): TargetMap {
    if (!hasOwn(this.data._targets, target)) {
      throw new FileMapError(`File map is missing targets: ${target}`);
    }

    return this.data._targets[target];
  }
}
