/**
 * Leveled logger for export and import runs.
 *
 * Each line carries the run ID and the component scope, so the lines of one
 * import can be picked out of a shared log file. Console lines go to stderr;
 * file output (LOG_TO_FILE) appends to symbridge.log under LOG_DIR.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  /** Lines below this level are dropped */
  level?: LogLevel;
  /** Created on first use when file output is on */
  logDir?: string;
  /** File name inside logDir */
  logFile?: string;
  /** Write lines to stderr */
  console?: boolean;
  /** Append lines to logDir/logFile */
  file?: boolean;
  /** Component tag printed after the run ID, e.g. "importer" */
  scope?: string;
}

const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, "scope">> = {
  level: "info",
  logDir: "output/logs",
  logFile: "symbridge.log",
  console: true,
  file: false,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger sharing this one's sinks under a nested scope */
  child(scope: string): Logger;
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  scope: string | undefined,
  context?: Record<string, unknown>
): string {
  const timestamp = new Date().toISOString();
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);
  const scopeStr = scope ? ` [${scope}]` : "";

  let entry = `[${timestamp}] [${levelStr}] [${runId}]${scopeStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

// Diagnostics go to stderr so that stdout stays clean for JSON output.
function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger. `child()` loggers share the options and nest the scope
 * as "parent:child".
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { scope, ...rest } = options;
  const opts = { ...DEFAULT_OPTIONS, ...rest };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry = formatLogEntry(level, message, scope, context);

    if (opts.console) {
      getConsoleMethod(level)(entry);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // Log file unwritable: the run goes on, the line is lost
        console.error(`Could not append to ${logFilePath}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (childScope) =>
      createLogger({ ...opts, scope: scope ? `${scope}:${childScope}` : childScope }),
  };
}

/**
 * Logger that discards everything. Used where a caller passes no logger.
 */
export const silentLogger: Logger = createLogger({ console: false, file: false });
