import express from "express";
import { z } from "zod";
import { HttpError } from "../errors";
import { describeError, logDebug, logError } from "../logging";
import { pushDocuments, toVersionSummary } from "../services/checkinService";
import { parseMultipartToTempFiles, removeTempDir } from "../services/multipart";
import { DocumentStore } from "../storage/DocumentStore";
import { PullResults, PushResults, RouteResults, ShowResults } from "../types";
import { Router } from "./Router";

export interface RequestRouterOptions {
  tempRoot: string;
  maxFileBytes: number;
  cancelCheckoutOnFailure: boolean;
  checkedInBy?: string;
}

const pullBodySchema = z.object({
  doc_ids: z.array(z.string().min(1))
});

function readQueryValues(value: unknown): string[] {
  const values = Array.isArray(value) ? value : [value];
  return values.filter((item): item is string => typeof item === "string" && item.trim().length > 0);
}

export class RequestRouter extends Router<Promise<RouteResults>> {
  private readonly store: DocumentStore;
  private readonly options: RequestRouterOptions;

  constructor(store: DocumentStore, options: RequestRouterOptions) {
    super();
    this.store = store;
    this.options = options;

    this.registerRoute("POST", "push", this.routePush);
    this.registerRoute("POST", "pull", this.routePull);
    this.registerRoute("GET", "show", this.routeShow);
  }

  async routePush(req: express.Request): Promise<PushResults> {
    const upload = await parseMultipartToTempFiles(req, {
      tempRoot: this.options.tempRoot,
      maxFileBytes: this.options.maxFileBytes
    });

    try {
      return await pushDocuments(this.store, upload, {
        checkedInBy: this.options.checkedInBy,
        cancelCheckoutOnFailure: this.options.cancelCheckoutOnFailure
      });
    } finally {
      await removeTempDir(upload.tempDir);
    }
  }

  async routeShow(req: express.Request): Promise<ShowResults> {
    const results: ShowResults = {};

    for (const docId of readQueryValues(req.query.docId)) {
      try {
        const version = await this.store.getCurrentVersion(docId);
        if (!version) {
          logError("[GIT-DOC-SHOW]", `No current version for [${docId}]`);
          continue;
        }

        results[docId] = {
          ...toVersionSummary(version),
          _checked_in_by: version.checkedInBy ?? null,
          _checked_in_comment: version.checkedInComment ?? null
        };
      } catch (error) {
        logError("[GIT-DOC-SHOW]", { docId, error: describeError(error) });
      }
    }

    return results;
  }

  async routePull(req: express.Request): Promise<PullResults> {
    const parsed = pullBodySchema.safeParse(req.body);
    if (!parsed.success) {
      throw new HttpError(400, "doc_ids must be an array of document ids");
    }

    const results: PullResults = {};

    for (const docId of parsed.data.doc_ids) {
      try {
        const version = await this.store.getCurrentVersion(docId);
        const content = version ? await this.store.getVersionContent(docId, version.docVerId) : null;
        if (!version || !content) {
          logError("[GIT-DOC-PULL]", `No current content for [${docId}]`);
          continue;
        }

        results[docId] = {
          ...toVersionSummary(version),
          _filename: content.fileName,
          _content_type: content.contentType,
          _content: content.bytes.toString("base64")
        };
        logDebug("[GIT-DOC-PULL]", { docId, docVerId: version.docVerId, size: content.bytes.length });
      } catch (error) {
        logError("[GIT-DOC-PULL]", { docId, error: describeError(error) });
      }
    }

    return results;
  }
}

export class ResponseRouter extends Router<void> {
  constructor() {
    super();

    this.registerRoute("POST", "push", this.writeResults);
    this.registerRoute("POST", "pull", this.writeResults);
    this.registerRoute("GET", "show", this.writeResults);
  }

  writeResults(res: express.Response, results: RouteResults): void {
    res.setHeader("Content-Type", "application/json");
    res.status(200).send(JSON.stringify(results));
  }
}
