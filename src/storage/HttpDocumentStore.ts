import { readFile } from "fs/promises";
import { z } from "zod";
import { CmsRequestError } from "../errors";
import { DocumentVersionRecord, NewVersionInput, StoredContent } from "../types";
import { DocumentStore } from "./DocumentStore";

type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface HttpDocumentStoreOptions {
  baseUrl: string;
  username?: string;
  password?: string;
  fetchImpl?: FetchLike;
}

const currentVersionSchema = z.object({
  docVerId: z.union([z.string(), z.number()]).transform(String),
  versionLabel: z.string(),
  editDate: z.coerce.date(),
  filename: z.string().default(""),
  mimeType: z.string().default("application/octet-stream"),
  checkedInBy: z.string().nullish(),
  checkedInComment: z.string().nullish()
});

export class HttpDocumentStore implements DocumentStore {
  readonly name = "http";
  private readonly baseUrl: string;
  private readonly authorization?: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpDocumentStoreOptions) {
    this.baseUrl = options.baseUrl.endsWith("/") ? options.baseUrl : `${options.baseUrl}/`;
    this.authorization = options.username
      ? `Basic ${Buffer.from(`${options.username}:${options.password ?? ""}`).toString("base64")}`
      : undefined;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async checkout(docId: string): Promise<void> {
    await this.send("POST", this.documentPath(docId, "checkout"));
  }

  async saveNewVersion(input: NewVersionInput): Promise<void> {
    const bytes = await readFile(input.filePath);
    const form = new FormData();
    form.append("file", new Blob([bytes], { type: input.contentType }), input.fileName);
    form.append("filename", input.fileName);
    form.append("mime_type", input.contentType);
    form.append("checked_in_comment", input.comment);
    form.append("version_type", input.versionFlag);
    if (input.checkedInBy) {
      form.append("checked_in_by", input.checkedInBy);
    }

    await this.send("POST", this.documentPath(input.docId, "versions"), form);
  }

  async getCurrentVersion(docId: string): Promise<DocumentVersionRecord | null> {
    const response = await this.send("GET", this.documentPath(docId, "versions/current"), undefined, true);
    if (!response) {
      return null;
    }

    const body = currentVersionSchema.parse(await response.json());
    return {
      docId,
      docVerId: body.docVerId,
      versionLabel: body.versionLabel,
      editDate: body.editDate,
      filename: body.filename,
      contentType: body.mimeType,
      checkedInBy: body.checkedInBy ?? undefined,
      checkedInComment: body.checkedInComment ?? undefined
    };
  }

  async getVersionContent(docId: string, docVerId: string): Promise<StoredContent | null> {
    const response = await this.send(
      "GET",
      this.documentPath(docId, `versions/${encodeURIComponent(docVerId)}/content`),
      undefined,
      true
    );
    if (!response) {
      return null;
    }

    const disposition = response.headers.get("content-disposition") || "";
    const fileNameMatch = /filename="?([^";]+)"?/i.exec(disposition);

    return {
      bytes: Buffer.from(await response.arrayBuffer()),
      contentType: response.headers.get("content-type") || "application/octet-stream",
      fileName: fileNameMatch?.[1] ?? `${docId}.bin`
    };
  }

  async cancelCheckout(docId: string): Promise<void> {
    await this.send("POST", this.documentPath(docId, "cancel-checkout"));
  }

  private documentPath(docId: string, suffix: string): string {
    return `documents/${encodeURIComponent(docId)}/${suffix}`;
  }

  private async send(
    method: "GET" | "POST",
    relativePath: string,
    body?: FormData,
    allowNotFound = false
  ): Promise<Response | null> {
    const url = new URL(relativePath, this.baseUrl);
    const headers: Record<string, string> = { accept: "application/json" };
    if (this.authorization) {
      headers.authorization = this.authorization;
    }

    const response = await this.fetchImpl(url, { method, headers, body });

    if (allowNotFound && response.status === 404) {
      return null;
    }

    if (!response.ok) {
      const text = await response.text();
      throw new CmsRequestError(
        response.status,
        `CMS ${method} ${url.pathname} failed with status ${response.status}${text ? `: ${text}` : ""}`
      );
    }

    return response;
  }
}
