/**
 * Simple logger utility with log levels
 *
 * Each module creates its own named logger; lines are written as
 * `<ISO timestamp> [LEVEL] [Context] message ...args`. The threshold is read
 * from LOG_LEVEL on first use and can be changed at runtime.
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  warning: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

/**
 * Parse a level name (case-insensitive). Unknown names yield INFO.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.INFO;
  return LEVEL_NAMES[value.trim().toLowerCase()] ?? LogLevel.INFO;
}

let currentLogLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

function prefix(level: string, context: string): string {
  return `${new Date().toISOString()} [${level}] [${context}]`;
}

/**
 * Create a logger instance with a context prefix
 *
 * @example
 * ```ts
 * const logger = createLogger('AppStore');
 * logger.info('Loaded', apps.length, 'apps');
 * ```
 */
export function createLogger(context: string): Logger {
  return {
    error: (...args: unknown[]): void => {
      if (currentLogLevel >= LogLevel.ERROR) {
        console.error(prefix('ERROR', context), ...args);
      }
    },

    warn: (...args: unknown[]): void => {
      if (currentLogLevel >= LogLevel.WARN) {
        console.warn(prefix('WARN', context), ...args);
      }
    },

    info: (...args: unknown[]): void => {
      if (currentLogLevel >= LogLevel.INFO) {
        console.log(prefix('INFO', context), ...args);
      }
    },

    debug: (...args: unknown[]): void => {
      if (currentLogLevel >= LogLevel.DEBUG) {
        console.log(prefix('DEBUG', context), ...args);
      }
    },
  };
}

/**
 * Get the current log level
 */
export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Set the log level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}
