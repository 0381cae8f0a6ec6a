/**
 * Level-filtered console logger used by templates and the loader.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type LogMethod = (message: string, context?: Record<string, unknown>) => void;

export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

/**
 * Console-like sink. Anything with the four level methods works, which
 * lets tests capture entries.
 */
export interface LogSink {
  debug (line: string): void;
  info (line: string): void;
  warn (line: string): void;
  error (line: string): void;
}

export interface LoggerOptions {
  /** Minimum level to output. */
  level?: LogLevel;
  /** Output sink, defaults to the global console. */
  console?: LogSink;
}

/**
 * Format a log entry as `[timestamp] [LEVEL] message {context}`.
 *
 * @param level - Entry level.
 * @param message - Log message.
 * @param context - Optional structured context, written as JSON.
 */
export const formatLogEntry = (level: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>): string => {
  const timestamp = new Date().toISOString();
  let entry = `[${timestamp}] [${level.toUpperCase().padEnd(5)}] ${message}`;
  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }
  return entry;
};

/**
 * Create a logger instance.
 *
 * @param options - Level and sink.
 */
export function createLogger (options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'warn';
  const sink = options.console ?? console;

  const log = (entryLevel: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>): void => {
    if (LOG_LEVEL_PRIORITY[entryLevel] < LOG_LEVEL_PRIORITY[level]) return;
    sink[entryLevel](formatLogEntry(entryLevel, message, context));
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
  };
}
