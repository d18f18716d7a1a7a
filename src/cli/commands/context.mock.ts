import { mkdir, mkdtemp, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { vi } from "vitest";
import { ApiAdaptorOptions, DocumentApi, ResponseContents, UploadFile } from "../apiAdaptor";
import { GitClient } from "../git";
import { Prompter } from "../prompt";
import { CliDependencies } from "./context";

export const DEV_URL = "https://dev.example.test/cms/";
export const PROD_URL = "https://prod.example.test/cms/";

export class FakeGitClient implements GitClient {
  sha = "abc123";
  branch = "main";
  message = "Add widget scripts";
  dirty = false;
  readonly tags: Array<{ name: string; message: string }> = [];

  constructor(private readonly topLevelDir: string) {}

  topLevel(): string {
    return this.topLevelDir;
  }

  headSha(): string {
    return this.sha;
  }

  currentBranch(): string {
    return this.branch;
  }

  lastCommitMessage(): string {
    return this.message;
  }

  hasUncommittedChanges(): boolean {
    return this.dirty;
  }

  createAnnotatedTag(name: string, message: string): void {
    this.tags.push({ name, message });
  }
}

export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];

  constructor(private readonly answers: string[] = []) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    return this.answers.shift() ?? "";
  }

  async askSecret(question: string): Promise<string> {
    return this.ask(question);
  }

  close(): void {}
}

export function createFakeApi(url: string) {
  return {
    url,
    postFiles: vi.fn(
      async (_route: string, _files: UploadFile[], _fields: Record<string, string>): Promise<ResponseContents> => null
    ),
    getJson: vi.fn(async (_route: string, _query: Record<string, string[]>): Promise<ResponseContents> => null),
    postJson: vi.fn(async (_route: string, _body: unknown): Promise<ResponseContents> => null)
  } satisfies DocumentApi;
}

export type FakeApi = ReturnType<typeof createFakeApi>;

export interface TestProject {
  topLevelDir: string;
  git: FakeGitClient;
  prompter: ScriptedPrompter;
  apis: Record<string, FakeApi>;
  apiOptions: ApiAdaptorOptions[];
  printed: string[];
  deps: CliDependencies;
}

/**
 * Lays out a working tree with two mapped scripts per target, a local module
 * directory and the deployed module directory it mirrors into.
 */
export async function createTestProject(answers: string[] = []): Promise<TestProject> {
  const topLevelDir = await mkdtemp(path.join(tmpdir(), "git-doc-mapper-"));

  await mkdir(path.join(topLevelDir, "src"), { recursive: true });
  await writeFile(path.join(topLevelDir, "src", "a.js"), "console.log('a');\n");
  await writeFile(path.join(topLevelDir, "src", "b.js"), "console.log('b');\n");

  await mkdir(path.join(topLevelDir, "widgets", "lib"), { recursive: true });
  await writeFile(path.join(topLevelDir, "widgets", "index.js"), "module.exports = {};\n");
  await writeFile(path.join(topLevelDir, "widgets", "lib", "util.js"), "module.exports = 1;\n");
  await mkdir(path.join(topLevelDir, "deployed", "widgets"), { recursive: true });
  await writeFile(path.join(topLevelDir, "deployed", "widgets", "stale.js"), "old\n");

  await writeFile(
    path.join(topLevelDir, ".gitdocrc.json"),
    JSON.stringify({
      defaultUsername: "tester",
      targets: {
        dev: { url: DEV_URL, transactionNumber: "101" },
        prod: { url: PROD_URL, transactionNumber: 202 }
      }
    })
  );
  await writeFile(
    path.join(topLevelDir, ".gitdocmap.json"),
    JSON.stringify({
      _targets: {
        dev: {
          _document_profiles: { "src/a.js": "DEV-1", "src/b.js": "DEV-2" },
          _module_directory: "deployed/widgets"
        },
        prod: {
          _document_profiles: { "src/a.js": "PROD-1", "src/b.js": "PROD-2" },
          _module_directory: null
        }
      }
    })
  );

  const git = new FakeGitClient(topLevelDir);
  const prompter = new ScriptedPrompter(answers);
  const apis: Record<string, FakeApi> = { [DEV_URL]: createFakeApi(DEV_URL), [PROD_URL]: createFakeApi(PROD_URL) };
  const apiOptions: ApiAdaptorOptions[] = [];
  const printed: string[] = [];

  const deps: CliDependencies = {
    git,
    prompter,
    createApi: (options) => {
      apiOptions.push(options);
      const api = apis[options.url];
      if (!api) {
        throw new Error(`no fake API for ${options.url}`);
      }
      return api;
    },
    now: () => new Date(2026, 9, 19, 8, 30, 5),
    cwd: topLevelDir,
    print: (text) => {
      printed.push(text);
    }
  };

  return { topLevelDir, git, prompter, apis, apiOptions, printed, deps };
}
