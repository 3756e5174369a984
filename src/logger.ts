import type { LogLevel } from "./types.js";

export type LogContext = Record<string, unknown>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLogLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLogLevel];
}

export function formatMessage(level: LogLevel, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const serialized = context ? JSON.stringify(context) : "{}";
  const contextStr = serialized === "{}" ? "" : ` ${serialized}`;
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext | Error): void;
  /** Returns a logger that adds `bindings` to every entry. */
  child(bindings: LogContext): Logger;
}

function createLogger(bindings: LogContext): Logger {
  const merge = (context?: LogContext): LogContext => ({ ...bindings, ...context });

  return {
    debug(message, context) {
      if (shouldLog("debug")) {
        console.log(formatMessage("debug", message, merge(context)));
      }
    },

    info(message, context) {
      if (shouldLog("info")) {
        console.log(formatMessage("info", message, merge(context)));
      }
    },

    warn(message, context) {
      if (shouldLog("warn")) {
        console.warn(formatMessage("warn", message, merge(context)));
      }
    },

    error(message, context) {
      if (!shouldLog("error")) {
        return;
      }
      if (context instanceof Error) {
        console.error(
          formatMessage("error", message, merge({ error: context.message, stack: context.stack }))
        );
      } else {
        console.error(formatMessage("error", message, merge(context)));
      }
    },

    child(extra) {
      return createLogger({ ...bindings, ...extra });
    },
  };
}

export const logger: Logger = createLogger({});
