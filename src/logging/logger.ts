/**
 * Leveled logger with structured fields.
 *
 * One line per entry: `<iso-ts> <LEVEL> <message> <json fields>`.
 * Output goes through `console` by default; tests inject a sink.
 */

import type { LogLevel } from "../config/index.js";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface CreateLoggerOptions {
  /** Minimum level written. Default: "info". */
  level?: LogLevel;
  /** Prefix added before the message, e.g. a component name. */
  scope?: string;
  sink?: LogSink;
  now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const consoleSink: LogSink = (level, line) => {
  if (level === "error" || level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
};

/** Format a single log line. Fields are omitted when empty. */
export function formatLogLine(
  ts: Date,
  level: LogLevel,
  message: string,
  fields?: LogFields,
): string {
  const base = `${ts.toISOString()} ${level.toUpperCase()} ${message}`;
  if (!fields || Object.keys(fields).length === 0) return base;
  return `${base} ${JSON.stringify(fields)}`;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;
  const now = options.now ?? (() => new Date());
  const prefix = options.scope ? `[${options.scope}] ` : "";

  const write = (level: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[level] < threshold) return;
    sink(level, formatLogLine(now(), level, prefix + message, fields));
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
  };
}

/** Logger that drops everything. Default for library use. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Render an unknown thrown value as a message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
