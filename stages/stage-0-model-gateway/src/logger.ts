import type {
  ErrorLog,
  EventLevel,
  EventLog,
  Logger,
  RequestLog,
  ResponseLog,
} from "./types.js";

export type LogLevel = "silent" | "error" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "error",
  "info",
  "debug",
];

const SEVERITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  info: 2,
  debug: 3,
};

function toJson(entry: RequestLog | ResponseLog | ErrorLog | EventLog): string {
  return JSON.stringify(entry);
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** JSON-lines logger: request/response/info to stdout, errors to stderr. */
export function createConsoleLogger(level: LogLevel = "info"): Logger {
  const enabled = (needed: EventLevel) => SEVERITY[level] >= SEVERITY[needed];

  return {
    logRequest(entry: RequestLog) {
      if (enabled("info")) {
        console.log(toJson(entry));
      }
    },
    logResponse(entry: ResponseLog) {
      if (enabled("info")) {
        console.log(toJson(entry));
      }
    },
    logError(entry: ErrorLog) {
      if (enabled("error")) {
        console.error(toJson(entry));
      }
    },
    logEvent(entry: EventLog) {
      if (!enabled(entry.level)) {
        return;
      }
      if (entry.level === "error") {
        console.error(toJson(entry));
      } else {
        console.log(toJson(entry));
      }
    },
  };
}

export function createSilentLogger(): Logger {
  return createConsoleLogger("silent");
}

/** Shorthand for emitting an EventLog with the current timestamp. */
export function logEvent(
  logger: Logger,
  level: EventLevel,
  scope: string,
  event: string,
  details?: Record<string, unknown>
): void {
  logger.logEvent({
    timestamp: new Date().toISOString(),
    level,
    scope,
    event,
    details,
  });
}
