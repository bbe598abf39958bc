/**
 * Console logging with tagged, redacted output
 *
 * Lines look like `[sso:state] Removing expired state entry {"key":"..."}`.
 */

import { redactSensitiveData } from "./redact.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger whose tag is extended with `scope` */
  child(scope: string): Logger;
}

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface ConsoleLoggerOptions {
  enabled?: boolean;
  level?: LogLevel;
  tag?: string;
}

/**
 * Creates a logger that writes to the console
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { enabled = true, level = "info", tag = "sso" } = options;
  const threshold = LEVEL_ORDER[level];

  const write = (lvl: LogLevel, message: string, context?: LogContext) => {
    if (!enabled || LEVEL_ORDER[lvl] < threshold) {
      return;
    }

    const line = `[${tag}] ${message}`;
    const sink =
      lvl === "error"
        ? console.error
        : lvl === "warn"
          ? console.warn
          : lvl === "debug"
            ? console.debug
            : console.log;

    if (context && Object.keys(context).length > 0) {
      sink(line, JSON.stringify(redactSensitiveData(context)));
    } else {
      sink(line);
    }
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
    child: (scope) =>
      createConsoleLogger({ enabled, level, tag: `${tag}:${scope}` }),
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
