/**
 * Console logging with timestamps and level filtering.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Minimum level written (default: 'warn') */
  level?: LogLevel;

  /** Tag placed after the timestamp, e.g. "ondd" */
  prefix?: string;
}

/**
 * Format timestamp for logging
 */
function formatTimestamp(): string {
  return new Date().toISOString();
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a logger writing `[timestamp] [prefix] message` lines to the console.
 * Everything goes to stderr so command output on stdout stays clean.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'warn');
  const tag = options.prefix ? ` [${options.prefix}]` : '';

  const write = (level: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) {
      return;
    }
    console.error(`[${formatTimestamp()}]${tag} ${level.toUpperCase()} ${message}`);
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

/** Logger that discards everything */
export const silentLogger: Logger = createLogger({ level: 'silent' });
