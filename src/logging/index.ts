/**
 * Logging and observability utilities.
 */

export { createRunId } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  loggerOptionsFromConfig,
  type LogEntry,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
