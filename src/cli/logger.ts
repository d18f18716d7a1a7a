import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
export type Logger = pino.Logger;

const LEVEL_NAMES: Record<number, string> = {
  10: "TRACE",
  20: "DEBUG",
  30: "INFO",
  40: "WARNING",
  50: "ERROR",
  60: "CRITICAL"
};

function readLine(chunk: string): { level: number; msg: string; err?: string } {
  const parsed: unknown = JSON.parse(chunk);
  if (typeof parsed !== "object" || parsed === null) {
    return { level: 30, msg: chunk.trim() };
  }

  const level = "level" in parsed && typeof parsed.level === "number" ? parsed.level : 30;
  const msg = "msg" in parsed && typeof parsed.msg === "string" ? parsed.msg : "";
  const err =
    "err" in parsed && typeof parsed.err === "object" && parsed.err !== null && "message" in parsed.err
      ? String(parsed.err.message)
      : undefined;

  return { level, msg, err };
}

// One "LEVEL - message" line per record.
function lineDestination(stream: NodeJS.WritableStream): pino.DestinationStream {
  return {
    write(chunk: string): void {
      let line: string;
      try {
        const { level, msg, err } = readLine(chunk);
        line = `${LEVEL_NAMES[level] ?? "LOG"} - ${msg}${err ? `: ${err}` : ""}\n`;
      } catch {
        line = chunk;
      }
      stream.write(line);
    }
  };
}

let rootLogger: pino.Logger | undefined;

function envLevel(): LogLevel | undefined {
  const value = process.env.GIT_DOC_MAPPER_LOG_LEVEL;
  switch (value) {
    case "trace":
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "fatal":
    case "silent":
      return value;
    default:
      return undefined;
  }
}

function getRootLogger(): pino.Logger {
  if (!rootLogger) {
    rootLogger = pino({ level: envLevel() ?? "info" }, lineDestination(process.stderr));
  }
  return rootLogger;
}

/**
 * Applies the level from the configuration file. GIT_DOC_MAPPER_LOG_LEVEL
 * takes precedence when set.
 */
export function configureLogLevel(level: LogLevel | undefined): void {
  const next = envLevel() ?? level;
  if (next) {
    getRootLogger().level = next;
  }
}

/**
 * Child loggers copy the root level when they are created, so commands ask for
 * theirs after the configuration has been applied.
 */
export function getLog(name: string): Logger {
  return getRootLogger().child({ module: name });
}

export function logError(logger: Logger, err: unknown, message: string): void {
  if (err instanceof Error) {
    logger.error({ err }, message);
  } else {
    logger.error({ err: { message: String(err) } }, message);
  }
}
