import {
  DEFAULT_LOCK_RETRY_MS,
  DEFAULT_LOCK_TIMEOUT_MS,
  DEFAULT_LOG_LEVEL,
} from './constants';
import { createLogger } from './logger';
import type { DocumentOptions, ResolvedOptions } from './types';

/**
 * Fill in defaults. Throws RangeError on a negative or non-finite lock
 * setting; a zero timeout means "one attempt, no wait".
 */
export function resolveOptions(options: DocumentOptions = {}): ResolvedOptions {
  const lockRetryMs   = options.lockRetryMs   ?? DEFAULT_LOCK_RETRY_MS;
  const lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;

  for (const [name, value] of [['lockRetryMs', lockRetryMs], ['lockTimeoutMs', lockTimeoutMs]] as const) {
    if (!Number.isFinite(value) || value < 0) {
      throw new RangeError(`${name} must be a non-negative finite number; got ${value}.`);
    }
  }

  return {
    lockRetryMs,
    lockTimeoutMs,
    logger: options.logger ?? createLogger(options.logLevel ?? DEFAULT_LOG_LEVEL),
  };
}
