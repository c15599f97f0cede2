/**
 * Logging utilities.
 */

export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerOptions,
} from "./logger.js";
