/**
 * Structured JSON logger.
 * Writes one JSON object per line: info and below to stdout, warn and error to stderr.
 */

import { describeError } from "./errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  child(context: LogContext): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Receives each formatted line instead of the process streams */
  sink?: (line: string, level: LogLevel) => void;
}

const LEVEL_ORDER: { [level in LogLevel]: number } = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Log level from FOLDERSYNC_LOG_LEVEL, defaulting to info.
 */
export function levelFromEnv(): LogLevel {
  const raw = process.env.FOLDERSYNC_LOG_LEVEL?.toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return "info";
}

function writeToProcess(line: string, level: LogLevel): void {
  if (level === "warn" || level === "error") {
    process.stderr.write(`${line}\n`);
  } else {
    process.stdout.write(`${line}\n`);
  }
}

class JsonLogger implements Logger {
  constructor(
    private readonly scope: string,
    private readonly bound: LogContext,
    private readonly level: LogLevel,
    private readonly sink: (line: string, level: LogLevel) => void
  ) {}

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const merged: LogContext = { ...context };
    if (error !== undefined) {
      merged.error = describeError(error);
    }
    this.write("error", message, merged);
  }

  child(context: LogContext): Logger {
    return new JsonLogger(
      this.scope,
      { ...this.bound, ...context },
      this.level,
      this.sink
    );
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    const entry = {
      time: new Date().toISOString(),
      level,
      scope: this.scope,
      msg: message,
      ...this.bound,
      ...context,
    };
    this.sink(JSON.stringify(entry), level);
  }
}

/**
 * Create a logger for a component.
 * @param scope - Component name included in every line (e.g., "engine")
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  return new JsonLogger(
    scope,
    {},
    options.level ?? levelFromEnv(),
    options.sink ?? writeToProcess
  );
}
