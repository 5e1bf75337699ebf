/**
 * Lightweight logging utility.
 * Outputs to the console, an append-only log file, and/or an injected sink,
 * with timestamps and a component scope.
 *
 * Rejection details (field, matched phrase) are written here and only here;
 * see errors/presentation.ts.
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

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly scope: string;
  readonly message: string;
  readonly context?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Component name shown in every entry */
  scope?: string;
  /** Receives every entry that passes the level filter */
  sink?: LogSink;
}

const DEFAULT_OPTIONS = {
  level: "info",
  logDir: "output/logs",
  logFile: "safety-gate.log",
  console: true,
  file: true,
  scope: "app",
} as const satisfies Omit<Required<LoggerOptions>, "sink">;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger with the same outputs, under a nested scope ("gate.pipeline") */
  child(scope: string): Logger;
}

/**
 * Format a log entry as a single line.
 */
export function formatLogEntry(entry: LogEntry): string {
  const levelStr = entry.level.toUpperCase().padEnd(5);
  let line = `[${entry.timestamp}] [${levelStr}] [${entry.scope}] ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${JSON.stringify(entry.context)}`;
  }

  return line;
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
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);

  // Ensure log directory exists
  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function build(scope: string): Logger {
    function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
      if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
        return;
      }

      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        scope,
        message,
        ...(context !== undefined ? { context } : {}),
      };

      opts.sink?.(entry);

      if (!opts.console && !opts.file) {
        return;
      }

      const line = formatLogEntry(entry);

      if (opts.console) {
        getConsoleMethod(level)(line);
      }

      if (opts.file) {
        try {
          appendFileSync(logFilePath, line + "\n");
        } catch (err) {
          // Fallback to console if file write fails
          console.error(`Failed to write to log file: ${err}`);
        }
      }
    }

    return {
      debug: (message, context) => log("debug", message, context),
      info: (message, context) => log("info", message, context),
      warn: (message, context) => log("warn", message, context),
      error: (message, context) => log("error", message, context),
      child: (childScope) => build(`${scope}.${childScope}`),
    };
  }

  return build(opts.scope);
}

/**
 * Logger that discards everything. Default for library components.
 */
export function createSilentLogger(): Logger {
  return createLogger({ console: false, file: false });
}
