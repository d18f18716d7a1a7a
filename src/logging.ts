import { env } from "./config/env";

type LogPayload = Record<string, unknown> | string;

function formatLine(tag: string, payload: LogPayload): string {
  return `${tag} ${typeof payload === "string" ? payload : JSON.stringify(payload)}`;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

export function logDebug(tag: string, payload: LogPayload): void {
  if (env.DEBUG_LOGGING) {
    console.log(formatLine(tag, payload));
  }
}

export function logInfo(tag: string, payload: LogPayload): void {
  console.log(formatLine(tag, payload));
}

export function logError(tag: string, payload: LogPayload): void {
  console.error(formatLine(tag, payload));
}
