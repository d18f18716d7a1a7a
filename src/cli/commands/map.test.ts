import { readFile, rm, writeFile } from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileMapError } from "../../errors";
import { createTestProject, TestProject } from "./context.mock";
import { runMap, toMappedPath } from "./map";

describe("toMappedPath", () => {
  it("makes the path relative to the top-level directory", () => {
    expect(toMappedPath("/work/repo", "/work/repo/src", "lib/a.js")).toBe("src/lib/a.js");
  });

  it("rejects files outside the working tree", () => {
    expect(() => toMappedPath("/work/repo", "/work/repo", "../other/a.js")).toThrow(FileMapError);
  });
});

describe("runMap", () => {
  let project: TestProject;

  async function readMap(): Promise<unknown> {
    return JSON.parse(await readFile(path.join(project.topLevelDir, ".gitdocmap.json"), "utf8"));
  }

  beforeEach(async () => {
    project = await createTestProject();
    await writeFile(path.join(project.topLevelDir, "src", "c.js"), "console.log('c');\n");
  });

  afterEach(async () => {
    await rm(project.topLevelDir, { recursive: true, force: true });
  });

  it("adds a file to an existing target", async () => {
    await runMap(project.deps, "src/c.js", { target: "prod", docId: "PROD-3" });

    expect(await readMap()).toEqual({
      _targets: {
        dev: {
          _document_profiles: { "src/a.js": "DEV-1", "src/b.js": "DEV-2" },
          _module_directory: "deployed/widgets"
        },
        prod: {
          _document_profiles: { "src/a.js": "PROD-1", "src/b.js": "PROD-2", "src/c.js": "PROD-3" },
          _module_directory: null
        }
      }
    });
  });

  it("prompts for the document id when it is not given", async () => {
    await rm(project.topLevelDir, { recursive: true, force: true });
    project = await createTestProject(["DEV-9"]);

    await runMap(project.deps, "src/b.js", { target: "dev" });

    expect(project.prompter.questions).toEqual(["Document id for src/b.js on dev: "]);
    expect(await readMap()).toMatchObject({
      _targets: { dev: { _document_profiles: { "src/a.js": "DEV-1", "src/b.js": "DEV-9" } } }
    });
  });

  it("refuses a document id that belongs to another file", async () => {
    await expect(runMap(project.deps, "src/c.js", { target: "dev", docId: "DEV-1" })).rejects.toThrow(
      new FileMapError("Document id DEV-1 is already mapped to src/a.js on target dev")
    );
  });

  it("creates the map file when there is none", async () => {
    await rm(path.join(project.topLevelDir, ".gitdocmap.json"));

    await runMap(project.deps, "src/c.js", { target: "dev", docId: "DEV-3" });

    expect(await readMap()).toEqual({
      _targets: { dev: { _document_profiles: { "src/c.js": "DEV-3" }, _module_directory: null } }
    });
  });

  it("refuses files that do not exist", async () => {
    await expect(runMap(project.deps, "src/missing.js", { target: "dev", docId: "DEV-3" })).rejects.toThrow(
      "File src/missing.js does not exist on disk."
    );
  });
});
