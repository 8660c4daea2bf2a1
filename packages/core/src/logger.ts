/**
 * Console-backed logger used by the cache
 */

export interface CacheLogger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  /** Emit debug lines (pass summaries, schema changes), default false */
  debug?: boolean;
  /** Line prefix, default `[slot-cache]` */
  prefix?: string;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): CacheLogger {
  const prefix = options.prefix ?? '[slot-cache]';
  const debugEnabled = options.debug ?? false;

  return {
    debug(message, ...args) {
      if (debugEnabled) {
        console.debug(`${prefix} ${message}`, ...args);
      }
    },
    warn(message, ...args) {
      console.warn(`${prefix} ${message}`, ...args);
    },
    error(message, ...args) {
      console.error(`${prefix} ${message}`, ...args);
    },
  };
}
