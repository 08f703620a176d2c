/**
 * Logger wrapper for consistent library logging
 */

import type { Logger, LogLevel } from './types';

const PREFIX = '[tcsv]';

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug:  10,
  info:   20,
  warn:   30,
  error:  40,
  silent: 100,
};

const noop = (): void => {};

export function createLogger(level: LogLevel): Logger {
  const enabled = (at: Exclude<LogLevel, 'silent'>): boolean => LEVEL_RANK[at] >= LEVEL_RANK[level];

  return {
    debug: enabled('debug') ? (...args: unknown[]) => console.debug(PREFIX, ...args) : noop,
    info:  enabled('info')  ? (...args: unknown[]) => console.info(PREFIX, ...args)  : noop,
    warn:  enabled('warn')  ? (...args: unknown[]) => console.warn(PREFIX, ...args)  : noop,
    error: enabled('error') ? (...args: unknown[]) => console.error(PREFIX, ...args) : noop,
  };
}
