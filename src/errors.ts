export class HttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
  }
}

export class UnrecognizedVersionTypeError extends HttpError {
  constructor(versionLabel: unknown) {
    super(400, `UNRECOGNIZED VERSION LABEL: ${String(versionLabel)}`);
    this.name = "UnrecognizedVersionTypeError";
  }
}

export class DocumentNotFoundError extends Error {
  constructor(docId: string) {
    super(`Document version series [${docId}] was not found`);
    this.name = "DocumentNotFoundError";
  }
}

export class CmsRequestError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = "CmsRequestError";
    this.statusCode = statusCode;
  }
}

export class ApiRequestError extends Error {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = "ApiRequestError";
    this.statusCode = statusCode;
  }
}

export class FileMapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FileMapError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class GitCommandError extends Error {
  readonly args: string[];

  constructor(args: string[], stderr: string) {
    super(`Unable to run command: git ${args.join(" ")}${stderr ? `: ${stderr}` : ""}`);
    this.name = "GitCommandError";
    this.args = args;
  }
}
