/**
 * Logging utilities.
 */

export {
  createLogger,
  formatLogEntry,
  silentLogger,
  type Logger,
  type LogLevel,
  type LoggerOptions,
  type LogSink,
} from "./logger.js";
