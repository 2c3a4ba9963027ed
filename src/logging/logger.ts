/**
 * Lightweight logging utility.
 * Outputs to the console and, optionally, a log file, with timestamps
 * and a scope naming the component that logged.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogSink = (level: LogLevel, entry: string) => void;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Scope printed with each entry */
  scope?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Extra destination for formatted entries */
  sink?: LogSink;
}

const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, "sink">> = {
  level: "info",
  scope: "semantics",
  console: true,
  file: false,
  logDir: "output/logs",
  logFile: "semantics.log",
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger with the same settings and a nested scope ("parent:child"). */
  child(scope: string): Logger;
}

/**
 * Format a log entry with timestamp, level, scope, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  scope: string,
  message: string,
  context?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${now.toISOString()}] [${levelStr}] [${scope}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { sink, ...rest } = options;
  const opts = { ...DEFAULT_OPTIONS, ...rest };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry = formatLogEntry(level, opts.scope, message, context);

    if (opts.console) {
      getConsoleMethod(level)(entry);
    }

    sink?.(level, entry);

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${String(err)}`);
      }
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (scope) => createLogger({ ...options, scope: `${opts.scope}:${scope}` }),
  };
}

/**
 * Logger that discards everything. Default for library calls that are
 * not handed a logger.
 */
export function createSilentLogger(): Logger {
  return createLogger({ console: false, file: false });
}
