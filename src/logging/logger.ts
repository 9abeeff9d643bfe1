/**
 * Lightweight logging utility.
 *
 * Each entry is one line: timestamp, level, logger name, message and an
 * optional JSON context.  Lines go to the console unless a sink is given.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Receives every formatted line at or above the logger's level. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Minimum log level to output (default: "info") */
  level?: LogLevel;
  /** Name printed with every entry (default: "app") */
  name?: string;
  /** Where lines go (default: the console method matching the level) */
  sink?: LogSink;
  /** Clock used for timestamps */
  now?: () => Date;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Format a log entry with timestamp, level, logger name, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  name: string,
  message: string,
  context?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${now.toISOString()}] [${levelStr}] [${name}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level: minLevel = "info",
    name = "app",
    sink = consoleSink,
    now = () => new Date(),
  } = options;

  function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) {
      return;
    }
    sink(level, formatLogEntry(level, name, message, context, now()));
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
  };
}

/**
 * A logger that discards everything.
 */
export const silentLogger: Logger = createLogger({ sink: () => {} });
