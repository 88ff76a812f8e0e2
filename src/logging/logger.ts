/**
 * Run-scoped logger.
 *
 * Every line carries the run id of the logger that wrote it:
 *
 *   [2025-01-15T09:30:00.000Z] [INFO ] [20250115-a1b2c3] [enrich-notes] Done {"total":12}
 *
 * Lines go to the console (one `console` method per level) and, when
 * enabled, are appended to `<logDir>/<logFile>`.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import type { AppConfig } from "../config/index.js";
import { createRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  /** Minimum level written */
  level?: LogLevel;
  /** Run id stamped on every line; a fresh one is created when omitted */
  runId?: string;
  /** Prefix for every message, e.g. "enrich-notes" */
  scope?: string;
  console?: boolean;
  file?: boolean;
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
}

export interface LogEntry {
  time: Date;
  level: LogLevel;
  runId: string;
  scope?: string;
  message: string;
  context?: Record<string, unknown>;
}

export interface Logger {
  readonly runId: string;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export function formatLogEntry(entry: LogEntry): string {
  const scope = entry.scope ? `[${entry.scope}] ` : "";
  let line =
    `[${entry.time.toISOString()}] [${entry.level.toUpperCase().padEnd(5)}] ` +
    `[${entry.runId}] ${scope}${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  return line;
}

function consoleFor(level: LogLevel): (line: string) => void {
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

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level: minLevel = "info",
    runId = createRunId(),
    scope,
    console: toConsole = true,
    file: toFile = false,
    logDir = "output/logs",
    logFile = "bookmark-enricher.log",
  } = options;
  const logPath = join(logDir, logFile);

  if (toFile) {
    mkdirSync(logDir, { recursive: true });
  }

  function write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;

    const line = formatLogEntry({ time: new Date(), level, runId, scope, message, context });

    if (toConsole) consoleFor(level)(line);

    if (toFile) {
      try {
        appendFileSync(logPath, line + "\n");
      } catch (err) {
        // Reported, not rethrown.
        console.error(`Failed to write to log file ${logPath}: ${err}`);
      }
    }
  }

  return {
    runId,
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
  };
}

/**
 * Logger options for one CLI run under the given configuration.
 */
export function loggerOptionsFromConfig(
  config: Pick<AppConfig, "logLevel" | "logToFile" | "logDir" | "appName">,
  scope: string,
  runId: string
): LoggerOptions {
  return {
    level: config.logLevel,
    runId,
    scope,
    file: config.logToFile,
    logDir: config.logDir,
    logFile: `${config.appName}.log`,
  };
}
