import type {
  ErrorLog,
  RequestLog,
  RequestLogger,
  ResponseLog,
} from "./types.js";

export type LogLevel = "silent" | "error" | "info";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "info"];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function toJson(
  event: "request" | "response" | "error",
  entry: RequestLog | ResponseLog | ErrorLog
): string {
  return JSON.stringify({ event, ...entry });
}

export function createConsoleLogger(level: LogLevel = "info"): RequestLogger {
  return {
    logRequest(entry: RequestLog) {
      if (level === "info") {
        console.log(toJson("request", entry));
      }
    },
    logResponse(entry: ResponseLog) {
      if (level === "info") {
        console.log(toJson("response", entry));
      }
    },
    logError(entry: ErrorLog) {
      if (level === "info" || level === "error") {
        console.error(toJson("error", entry));
      }
    },
  };
}
