/**
 * Logging and observability utilities.
 */

export { generateTraceId } from "./trace-id.js";
export {
  createLogger,
  createSilentLogger,
  formatLogEntry,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from "./logger.js";
