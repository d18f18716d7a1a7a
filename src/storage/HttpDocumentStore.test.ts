import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CmsRequestError } from "../errors";
import { HttpDocumentStore } from "./HttpDocumentStore";

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" }
  });
}

describe("HttpDocumentStore", () => {
  const fetchImpl = vi.fn<(input: string | URL, init?: RequestInit) => Promise<Response>>();
  let store: HttpDocumentStore;

  beforeEach(() => {
    fetchImpl.mockReset();
    store = new HttpDocumentStore({
      baseUrl: "https://cms.example.test/api",
      username: "tester",
      password: "test-secret",
      fetchImpl
    });
  });

  function lastCall(): { url: string; init: RequestInit | undefined } {
    const [input, init] = fetchImpl.mock.calls[fetchImpl.mock.calls.length - 1];
    return { url: String(input), init };
  }

  it("posts a checkout with basic credentials", async () => {
    fetchImpl.mockResolvedValue(new Response(null, { status: 204 }));

    await store.checkout("DOC 1");

    const { url, init } = lastCall();
    expect(url).toBe("https://cms.example.test/api/documents/DOC%201/checkout");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      accept: "application/json",
      authorization: `Basic ${Buffer.from("tester:test-secret").toString("base64")}`
    });
  });

  it("maps the current version answer", async () => {
    fetchImpl.mockResolvedValue(
      jsonResponse(200, {
        docVerId: 3041,
        versionLabel: "2.1",
        editDate: "2026-10-19T08:30:00Z",
        filename: "a.js",
        mimeType: "text/javascript",
        checkedInBy: "JDOE",
        checkedInComment: null
      })
    );

    const version = await store.getCurrentVersion("DOC-1");

    expect(lastCall().url).toBe("https://cms.example.test/api/documents/DOC-1/versions/current");
    expect(version).toEqual({
      docId: "DOC-1",
      docVerId: "3041",
      versionLabel: "2.1",
      editDate: new Date(Date.UTC(2026, 9, 19, 8, 30, 0)),
      filename: "a.js",
      contentType: "text/javascript",
      checkedInBy: "JDOE",
      checkedInComment: undefined
    });
  });

  it("returns null when the CMS does not know the document", async () => {
    fetchImpl.mockResolvedValue(new Response("missing", { status: 404 }));

    expect(await store.getCurrentVersion("DOC-404")).toBeNull();
  });

  it("raises the CMS status for other failures", async () => {
    fetchImpl.mockResolvedValue(new Response("locked", { status: 409 }));

    const error = await store.checkout("DOC-1").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CmsRequestError);
    expect(error).toMatchObject({
      statusCode: 409,
      message: "CMS POST /api/documents/DOC-1/checkout failed with status 409: locked"
    });
  });

  it("reads version content with its file name", async () => {
    fetchImpl.mockResolvedValue(
      new Response("body", {
        status: 200,
        headers: { "content-type": "text/plain", "content-disposition": 'attachment; filename="a.js"' }
      })
    );

    const content = await store.getVersionContent("DOC-1", "7");

    expect(lastCall().url).toBe("https://cms.example.test/api/documents/DOC-1/versions/7/content");
    expect(content?.bytes.toString("utf8")).toBe("body");
    expect(content?.fileName).toBe("a.js");
    expect(content?.contentType).toBe("text/plain");
  });

  describe("saveNewVersion", () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await mkdtemp(path.join(tmpdir(), "http-store-"));
    });

    afterEach(async () => {
      await rm(tempDir, { recursive: true, force: true });
    });

    it("uploads the file with the check-in fields", async () => {
      const filePath = path.join(tempDir, "a.part");
      await writeFile(filePath, "console.log(1);");
      fetchImpl.mockResolvedValue(new Response(null, { status: 201 }));

      await store.saveNewVersion({
        docId: "DOC-1",
        fileName: "a.js",
        contentType: "text/plain",
        filePath,
        comment: '{"current_sha_hash":"abc123"}',
        versionFlag: "M",
        checkedInBy: "tester"
      });

      const { url, init } = lastCall();
      expect(url).toBe("https://cms.example.test/api/documents/DOC-1/versions");
      const form = init?.body;
      expect(form).toBeInstanceOf(FormData);
      if (!(form instanceof FormData)) {
        return;
      }
      expect(form.get("filename")).toBe("a.js");
      expect(form.get("version_type")).toBe("M");
      expect(form.get("checked_in_comment")).toBe('{"current_sha_hash":"abc123"}');
      expect(form.get("checked_in_by")).toBe("tester");
      const file = form.get("file");
      expect(file).toBeInstanceOf(Blob);
      if (file instanceof Blob) {
        expect(await file.text()).toBe("console.log(1);");
      }
    });
  });
});
