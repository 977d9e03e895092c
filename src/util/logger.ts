/**
 * Tagged console logger.
 *
 * Every line is prefixed with its component tag (`[DISPATCH]`, `[MODE]`, ...)
 * and filtered against a level threshold.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

/**
 * Create a logger for one component.
 *
 * @param tag   - Component tag, printed in brackets.
 * @param level - Lowest level that is printed.
 */
export function create_logger(tag: string, level: LogLevel = 'info'): Logger {
  const prefix = `[${tag}]`;
  const enabled = (at: Exclude<LogLevel, 'silent'>): boolean => LEVEL_RANK[at] >= LEVEL_RANK[level];

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.debug(prefix, message, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) console.info(prefix, message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.warn(prefix, message, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(prefix, message, ...args);
    }
  };
}
