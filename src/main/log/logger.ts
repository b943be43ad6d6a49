/**
 * Tagged console logger.
 *
 * Every line goes to stderr as `[scope] message` so stdout stays free for
 * the live display. The threshold is process-wide and set once from
 * configuration.
 *
 * @module log/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

let threshold: LogLevel = 'warn';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function set_log_level(level: LogLevel): void {
  threshold = level;
}

export function is_log_level(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Create a logger whose lines are prefixed with `[scope]`. */
export function create_logger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) {
      return;
    }
    const line = `[${scope}] ${message}`;
    if (level === 'warn') {
      console.warn(line, ...details);
    } else {
      console.error(line, ...details);
    }
  };

  return {
    debug: (message, ...details) => emit('debug', message, details),
    info: (message, ...details) => emit('info', message, details),
    warn: (message, ...details) => emit('warn', message, details),
    error: (message, ...details) => emit('error', message, details)
  };
}
