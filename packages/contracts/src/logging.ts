import type { StyleError } from './errors.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface StyleLogger {
  debug(message: string, ...context: unknown[]): void;
  info(message: string, ...context: unknown[]): void;
  warn(message: string, ...context: unknown[]): void;
  error(message: string, ...context: unknown[]): void;
}

/**
 * Caller-owned receiver for failures returned by style operations.
 *
 * Observers are passed in explicitly; there is no process-wide handler.
 */
export interface StyleErrorObserver {
  onError(error: StyleError): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console-backed logger. Messages are prefixed with `[source]` and dropped below `level`.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger('StyleManager', 'debug');
 * logger.warn('Skipping numbering style', { style: 'List Bullet' });
 * // [StyleManager] Skipping numbering style { style: 'List Bullet' }
 * ```
 */
export function createConsoleLogger(source: string, level: LogLevel = 'warn'): StyleLogger {
  const threshold = LEVEL_RANK[level];
  const prefix = `[${source}]`;
  const enabled = (candidate: Exclude<LogLevel, 'silent'>) => LEVEL_RANK[candidate] >= threshold;

  return {
    debug: (message, ...context) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...context);
    },
    info: (message, ...context) => {
      if (enabled('info')) console.info(`${prefix} ${message}`, ...context);
    },
    warn: (message, ...context) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...context);
    },
    error: (message, ...context) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...context);
    },
  };
}
