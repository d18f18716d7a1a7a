import { randomUUID } from "crypto";
import { createWriteStream } from "fs";
import { mkdtemp, rm } from "fs/promises";
import path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import Busboy from "busboy";
import express from "express";
import { HttpError } from "../errors";
import { logDebug } from "../logging";
import { ParsedUpload, UploadedTempFile } from "../types";

export interface MultipartOptions {
  tempRoot: string;
  maxFileBytes: number;
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseClientData(raw: string): Record<string, unknown> | undefined {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return undefined;
    }
    throw error;
  }

  return isObjectRecord(value) ? value : undefined;
}

function toUploadError(error: unknown): Error {
  if (error instanceof HttpError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new HttpError(400, `malformed multipart body: ${message}`);
}

export async function removeTempDir(tempDir: string): Promise<void> {
  await rm(tempDir, { recursive: true, force: true });
}

/**
 * Reads a multipart/form-data body. File parts are written to disk as soon as
 * they arrive; the part name is the document id. Field parts carry the client
 * data as JSON, and the last one that parses to an object wins.
 */
export async function parseMultipartToTempFiles(
  req: express.Request,
  options: MultipartOptions
): Promise<ParsedUpload> {
  const contentType = req.headers["content-type"];
  if (!contentType || !contentType.includes("multipart/form-data")) {
    throw new HttpError(400, "multipart/form-data content-type is required");
  }

  const tempDir = await mkdtemp(path.join(options.tempRoot, "git-doc-"));
  const files: UploadedTempFile[] = [];
  const writes: Promise<void>[] = [];
  let clientData: Record<string, unknown> = {};

  try {
    await new Promise<void>((resolve, reject) => {
      const busboy = Busboy({ headers: req.headers, limits: { fileSize: options.maxFileBytes } });
      const openStreams = new Set<Readable>();

      const fail = (error: unknown): void => {
        for (const stream of openStreams) {
          stream.destroy();
        }
        reject(toUploadError(error));
      };

      busboy.on("field", (name, value) => {
        logDebug("[GIT-DOC-MULTIPART]", { part: "parameter", name, length: value.length });

        const parsed = parseClientData(value);
        if (parsed) {
          clientData = parsed;
        }
      });

      busboy.on("file", (name, stream, info) => {
        const upload: UploadedTempFile = {
          docId: name,
          fileName: info.filename || `${name}.bin`,
          contentType: info.mimeType || "application/octet-stream",
          filePath: path.join(tempDir, `${randomUUID()}.part`)
        };
        files.push(upload);
        openStreams.add(stream);

        logDebug("[GIT-DOC-MULTIPART]", {
          part: "file",
          name,
          fileName: upload.fileName,
          contentType: upload.contentType
        });

        stream.on("limit", () => {
          reject(new HttpError(413, `file part [${name}] exceeds limit of ${options.maxFileBytes} bytes`));
        });

        writes.push(
          pipeline(stream, createWriteStream(upload.filePath))
            .catch(fail)
            .finally(() => openStreams.delete(stream))
        );
      });

      busboy.on("error", fail);
      busboy.on("close", () => {
        void Promise.all(writes).then(() => resolve());
      });

      // Aborted requests reject here.
      void pipeline(req, busboy).catch(fail);
    });
  } catch (error) {
    await Promise.allSettled(writes);
    await removeTempDir(tempDir);
    throw error;
  }

  return { tempDir, files, clientData };
}
