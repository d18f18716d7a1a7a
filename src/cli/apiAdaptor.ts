import * as cheerio from "cheerio";
import { ApiRequestError } from "../errors";
import { getLog } from "./logger";

export type ResponseContents = string | Record<string, unknown> | unknown[] | null;

type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface UploadFile {
  /** Multipart part name. */
  field: string;
  fileName: string;
  contentType: string;
  content: Buffer;
}

export interface DocumentApi {
  readonly url: string;
  postFiles(route: string, files: UploadFile[], fields: Record<string, string>): Promise<ResponseContents>;
  getJson(route: string, query: Record<string, string[]>): Promise<ResponseContents>;
  postJson(route: string, body: unknown): Promise<ResponseContents>;
}

export interface ApiAdaptorOptions {
  url: string;
  transactionNumber: string;
  username: string;
  password: string;
  fetchImpl?: FetchLike;
}

const LOCAL_HOSTS = new Set(["localhost", "127.0.0.1", "[::1]"]);

/** Checks the base URL and returns it with exactly one trailing slash. */
export function validateUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ApiRequestError(`URL is invalid: ${url}`);
  }

  if (!parsed.host) {
    throw new ApiRequestError(`URL domain is invalid: ${parsed.host}; ${url}`);
  }

  const plainHttpAllowed = parsed.protocol === "http:" && LOCAL_HOSTS.has(parsed.hostname);
  if (parsed.protocol !== "https:" && !plainHttpAllowed) {
    throw new ApiRequestError(`URL scheme is not \`https\`; ${url}`);
  }

  return `${url.replace(/\/+$/, "")}/`;
}

/** Visible text of an HTML body, one text run per line. */
export function htmlBodyText(html: string): string | null {
  const $ = cheerio.load(html);
  const body = $("body");
  if (body.length === 0) {
    return null;
  }

  body.find("script, style").remove();
  body.find("*").each((_, element) => {
    $(element).prepend("\n").append("\n");
  });

  return body
    .text()
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

export async function parseContents(response: Response): Promise<ResponseContents> {
  const contentType = (response.headers.get("content-type") || "").toLowerCase();
  const text = await response.text();
  if (!text) {
    return null;
  }

  if (contentType.includes("text/html") || contentType.includes("application/xhtml+xml")) {
    return htmlBodyText(text) ?? text;
  }

  if (contentType.includes("application/json")) {
    try {
      const parsed: unknown = JSON.parse(text);
      if (Array.isArray(parsed) || isRecord(parsed)) {
        return parsed;
      }
      return String(parsed);
    } catch (error) {
      if (!(error instanceof SyntaxError)) {
        throw error;
      }
      getLog("apiAdaptor").error(`Error while parsing JSON from response with Content-Type: ${contentType}`);
    }
  }

  return text;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeContents(contents: ResponseContents): string {
  if (contents === null) {
    return "None";
  }
  return typeof contents === "string" ? contents : JSON.stringify(contents);
}

export class ApiAdaptor implements DocumentApi {
  readonly url: string;
  private readonly transactionNumber: string;
  private readonly authorization: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: ApiAdaptorOptions) {
    this.url = validateUrl(options.url);
    this.transactionNumber = options.transactionNumber;
    this.authorization = `Basic ${Buffer.from(`${options.username}:${options.password}`).toString("base64")}`;
    this.fetchImpl = options.fetchImpl ?? fetch;

    getLog("apiAdaptor").info(`Initialized API connector with URL [${options.url}]`);
  }

  endpoint(route: string, query: Record<string, string[]> = {}): URL {
    const endpoint = new URL("actioncode", this.url);
    endpoint.searchParams.set("tranxNum", this.transactionNumber);
    endpoint.searchParams.set("route", route);
    for (const [key, values] of Object.entries(query)) {
      for (const value of values) {
        endpoint.searchParams.append(key, value);
      }
    }
    return endpoint;
  }

  async postFiles(route: string, files: UploadFile[], fields: Record<string, string>): Promise<ResponseContents> {
    const form = new FormData();
    for (const file of files) {
      form.append(file.field, new Blob([file.content], { type: file.contentType }), file.fileName);
    }
    for (const [name, value] of Object.entries(fields)) {
      form.append(name, value);
    }

    return this.send("POST", this.endpoint(route), form);
  }

  async getJson(route: string, query: Record<string, string[]>): Promise<ResponseContents> {
    return this.send("GET", this.endpoint(route, query));
  }

  async postJson(route: string, body: unknown): Promise<ResponseContents> {
    return this.send("POST", this.endpoint(route), JSON.stringify(body), "application/json");
  }

  private async send(
    method: "GET" | "POST",
    endpoint: URL,
    body?: FormData | string,
    contentType?: string
  ): Promise<ResponseContents> {
    getLog("apiAdaptor").debug(`endpoint: ${endpoint.toString()}`);

    const headers: Record<string, string> = { authorization: this.authorization };
    if (contentType) {
      headers["content-type"] = contentType;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(endpoint, { method, headers, body });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ApiRequestError(`Error connecting to ${this.url}: ${reason}`);
    }

    const contents = await parseContents(response);
    if (response.status >= 200 && response.status <= 299) {
      return contents;
    }

    const detail = describeContents(contents);
    if (response.status === 400) {
      throw new ApiRequestError(`Bad request: HTTP Error 400: Server error message: ${detail}`, 400);
    }
    if (response.status === 401) {
      throw new ApiRequestError(`Invalid auth: HTTP Error 401: Error connecting to server: ${detail}`, 401);
    }
    throw new ApiRequestError(`Response error: Status code ${response.status}: ${detail}`, response.status);
  }
}
