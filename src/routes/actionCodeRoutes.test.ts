import { mkdtemp, readdir, rm } from "fs/promises";
import { createServer, request as httpRequest } from "http";
import { tmpdir } from "os";
import path from "path";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../app";
import { LocalDocumentStore } from "../storage/LocalDocumentStore";
import { parseBasicCredentials } from "./actionCodeRoutes";

const BOUNDARY = "git-doc-boundary";
const PARTIAL_FILE_PART =
  `--${BOUNDARY}\r\n` +
  'Content-Disposition: form-data; name="DOC-1"; filename="a.js"\r\n' +
  "Content-Type: text/plain\r\n\r\n" +
  "console.log('a');";
const EDIT_DATE = new Date(Date.UTC(2026, 9, 19, 8, 30, 0));

describe("action-code routes", () => {
  let storeDir: string;
  let uploadDir: string;

  function buildApp(overrides: { transactionNumber?: string } = {}) {
    return createApp({
      storeName: "local",
      createStore: (credentials) =>
        new LocalDocumentStore({ rootDir: storeDir, actor: credentials.username, now: () => EDIT_DATE }),
      tempRoot: uploadDir,
      maxUploadMb: 1,
      cancelCheckoutOnFailure: false,
      transactionNumber: overrides.transactionNumber,
      traceRequests: false
    });
  }

  function pushRequest(app: ReturnType<typeof buildApp>, clientData: string) {
    return request(app)
      .post("/actioncode?tranxNum=4242&route=push")
      .auth("tester", "test-secret")
      .attach("DOC-1", Buffer.from("console.log('a');"), { filename: "src/a.js", contentType: "text/plain" })
      .attach("DOC-2", Buffer.from("console.log('b');"), { filename: "src/b.js", contentType: "text/plain" })
      .field("client_data", clientData);
  }

  beforeEach(async () => {
    storeDir = await mkdtemp(path.join(tmpdir(), "store-"));
    uploadDir = await mkdtemp(path.join(tmpdir(), "uploads-"));
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(storeDir, { recursive: true, force: true });
    await rm(uploadDir, { recursive: true, force: true });
  });

  it("answers the health probe", async () => {
    const response = await request(buildApp()).get("/health");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: "ok", store: "local" });
  });

  it("checks in every uploaded file and returns the new versions", async () => {
    const response = await pushRequest(
      buildApp(),
      JSON.stringify({ version_type: "minor", current_sha_hash: "abc123" })
    );

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      "DOC-1": { _doc_ver_id: "1", _version_label: "0.1", _edit_date: "2026-10-19T08:30:00" },
      "DOC-2": { _doc_ver_id: "1", _version_label: "0.1", _edit_date: "2026-10-19T08:30:00" }
    });
    expect(await readdir(uploadDir)).toEqual([]);
  });

  it("bumps the major version on a major push", async () => {
    const app = buildApp();
    await pushRequest(app, JSON.stringify({ version_type: "minor" }));

    const response = await pushRequest(app, JSON.stringify({ version_type: "MAJOR" }));

    expect(response.body["DOC-1"]).toEqual({
      _doc_ver_id: "2",
      _version_label: "1.0",
      _edit_date: "2026-10-19T08:30:00"
    });
  });

  it("leaves out a file whose check-in fails", async () => {
    const response = await request(buildApp())
      .post("/actioncode?route=push")
      .auth("tester", "test-secret")
      .attach("DOC-1", Buffer.from("a"), { filename: "a.js", contentType: "text/plain" })
      .attach("bad id", Buffer.from("b"), { filename: "b.js", contentType: "text/plain" })
      .attach("DOC-3", Buffer.from("c"), { filename: "c.js", contentType: "text/plain" })
      .field("client_data", JSON.stringify({ version_type: "minor" }));

    expect(response.status).toBe(200);
    expect(Object.keys(response.body)).toEqual(["DOC-1", "DOC-3"]);
    expect(await readdir(uploadDir)).toEqual([]);
  });

  it("rejects an unknown version type and still removes the uploads", async () => {
    const response = await pushRequest(buildApp(), JSON.stringify({ version_type: "patch" }));

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "UNRECOGNIZED VERSION LABEL: patch" });
    expect(await readdir(uploadDir)).toEqual([]);
  });

  it("ignores a parameter part that is not JSON", async () => {
    const response = await pushRequest(buildApp(), "{not json");

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "UNRECOGNIZED VERSION LABEL: undefined" });
  });

  it("keeps the earlier client data when a later parameter part is not JSON", async () => {
    const response = await request(buildApp())
      .post("/actioncode?route=push")
      .auth("tester", "test-secret")
      .attach("DOC-1", Buffer.from("a"), { filename: "a.js", contentType: "text/plain" })
      .field("client_data", JSON.stringify({ version_type: "major" }))
      .field("client_data", "{not json");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      "DOC-1": { _doc_ver_id: "1", _version_label: "1.0", _edit_date: "2026-10-19T08:30:00" }
    });
  });

  it("uses the last valid parameter part", async () => {
    const response = await request(buildApp())
      .post("/actioncode?route=push")
      .auth("tester", "test-secret")
      .attach("DOC-1", Buffer.from("a"), { filename: "a.js", contentType: "text/plain" })
      .field("client_data", JSON.stringify({ version_type: "minor" }))
      .field("client_data", JSON.stringify({ version_type: "major" }));

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      "DOC-1": { _doc_ver_id: "1", _version_label: "1.0", _edit_date: "2026-10-19T08:30:00" }
    });
  });

  it("requires basic credentials", async () => {
    const response = await request(buildApp()).post("/actioncode?route=push");

    expect(response.status).toBe(401);
    expect(response.headers["www-authenticate"]).toBe('Basic realm="git-doc-mapper"');
  });

  it("rejects a transaction number it does not serve", async () => {
    const response = await request(buildApp({ transactionNumber: "4242" }))
      .get("/actioncode?tranxNum=1&route=show&docId=DOC-1")
      .auth("tester", "test-secret");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: "unknown transaction" });
  });

  it("serves the configured transaction number", async () => {
    const response = await request(buildApp({ transactionNumber: "4242" }))
      .get("/actioncode?tranxNum=4242&route=show&docId=DOC-1")
      .auth("tester", "test-secret");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({});
  });

  it("sends an empty response for an unknown route", async () => {
    const response = await request(buildApp()).post("/actioncode?route=merge").auth("tester", "test-secret");

    expect(response.status).toBe(200);
    expect(response.text).toBe("");
  });

  it("sends an empty response for a known route under the wrong method", async () => {
    const response = await request(buildApp()).get("/actioncode?route=push").auth("tester", "test-secret");

    expect(response.status).toBe(200);
    expect(response.text).toBe("");
  });

  it("shows the current version of pushed documents", async () => {
    const app = buildApp();
    await pushRequest(app, JSON.stringify({ version_type: "minor", current_sha_hash: "abc123" }));

    const response = await request(app)
      .get("/actioncode?route=show&docId=DOC-1&docId=MISSING")
      .auth("tester", "test-secret");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      "DOC-1": {
        _doc_ver_id: "1",
        _version_label: "0.1",
        _edit_date: "2026-10-19T08:30:00",
        _checked_in_by: "tester",
        _checked_in_comment: '{"current_sha_hash":"abc123"}'
      }
    });
  });

  it("returns the content of the current version on pull", async () => {
    const app = buildApp();
    await pushRequest(app, JSON.stringify({ version_type: "minor" }));

    const response = await request(app)
      .post("/actioncode?route=pull")
      .auth("tester", "test-secret")
      .send({ doc_ids: ["DOC-2", "MISSING"] });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      "DOC-2": {
        _doc_ver_id: "1",
        _version_label: "0.1",
        _edit_date: "2026-10-19T08:30:00",
        _filename: "b.js",
        _content_type: "text/plain",
        _content: Buffer.from("console.log('b');").toString("base64")
      }
    });
  });

  it("rejects a pull without document ids", async () => {
    const response = await request(buildApp())
      .post("/actioncode?route=pull")
      .auth("tester", "test-secret")
      .send({ ids: "DOC-1" });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "doc_ids must be an array of document ids" });
  });

  it("rejects a push that is not multipart", async () => {
    const response = await request(buildApp())
      .post("/actioncode?route=push")
      .auth("tester", "test-secret")
      .send({ version_type: "minor" });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "multipart/form-data content-type is required" });
  });

  it("rejects a file part over the upload limit", async () => {
    const response = await request(buildApp())
      .post("/actioncode?route=push")
      .auth("tester", "test-secret")
      .attach("DOC-1", Buffer.alloc(1024 * 1024 + 1, 97), { filename: "big.js", contentType: "text/plain" })
      .field("client_data", JSON.stringify({ version_type: "minor" }));

    expect(response.status).toBe(413);
    expect(await readdir(uploadDir)).toEqual([]);
  });

  it("rejects a body that ends inside a file part", async () => {
    const response = await request(buildApp())
      .post("/actioncode?route=push")
      .auth("tester", "test-secret")
      .set("content-type", `multipart/form-data; boundary=${BOUNDARY}`)
      .send(PARTIAL_FILE_PART);

    expect(response.status).toBe(400);
    expect(response.body.error).toMatch(/^malformed multipart body: Unexpected end of (form|file)$/);
    expect(await readdir(uploadDir)).toEqual([]);
  });

  it("removes the uploads when the client disconnects mid-push", async () => {
    const server = createServer(buildApp());
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));

    try {
      const address = server.address();
      if (!address || typeof address === "string") {
        throw new Error("server is not listening on a port");
      }

      const client = httpRequest({
        host: "127.0.0.1",
        port: address.port,
        method: "POST",
        path: "/actioncode?route=push",
        auth: "tester:test-secret",
        headers: {
          "content-type": `multipart/form-data; boundary=${BOUNDARY}`,
          "content-length": "100000"
        }
      });
      client.on("error", () => undefined);
      client.write(PARTIAL_FILE_PART);

      await vi.waitFor(async () => {
        expect(await readdir(uploadDir)).toHaveLength(1);
      });
      client.destroy();

      await vi.waitFor(async () => {
        expect(await readdir(uploadDir)).toEqual([]);
      });
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});

describe("parseBasicCredentials", () => {
  it("decodes user and password", () => {
    const header = `Basic ${Buffer.from("jdoe:pa:ss").toString("base64")}`;

    expect(parseBasicCredentials(header)).toEqual({ username: "jdoe", password: "pa:ss" });
  });

  it("returns null for other schemes", () => {
    expect(parseBasicCredentials("Bearer test-token")).toBeNull();
    expect(parseBasicCredentials(undefined)).toBeNull();
  });
});
