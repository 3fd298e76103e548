/**
 * Structured logger.
 *
 * Messages carry a "[Scope]" prefix and an optional context object:
 *   logger.info("[Executor] Page fetched", { propertyId, rows });
 *
 * LOG_FORMAT=json prints one JSON object per line; anything else prints plain
 * console output. LOG_LEVEL filters below the given level (default info).
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export type Logger = {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
};

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function minLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function consoleFor(level: LogLevel): (...args: unknown[]) => void {
  if (level === "error") return console.error;
  if (level === "warn") return console.warn;
  if (level === "debug") return console.debug;
  return console.log;
}

function emit(level: LogLevel, message: string, context?: LogContext) {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel()]) return;
  const fn = consoleFor(level);

  if ((process.env.LOG_FORMAT ?? "").toLowerCase() === "json") {
    const entry: Record<string, unknown> = {
      level,
      ts: new Date().toISOString(),
      msg: message,
    };
    if (context) Object.assign(entry, context);
    fn(JSON.stringify(entry));
    return;
  }

  if (context && Object.keys(context).length > 0) {
    fn(message, context);
  } else {
    fn(message);
  }
}

export const logger: Logger = {
  debug(message, context) {
    emit("debug", message, context);
  },
  info(message, context) {
    emit("info", message, context);
  },
  warn(message, context) {
    emit("warn", message, context);
  },
  error(message, context) {
    emit("error", message, context);
  },
};

/** Keeps log lines small when a context carries record samples. */
export function sampleForLog(values: unknown[], count = 2, maxChars = 500): string {
  const text = JSON.stringify(values.slice(0, count));
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}
