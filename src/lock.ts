/**
 * tcsv — cooperative cross-process file lock
 *
 * The lock is a marker file next to the backing document (`<path>.lock`),
 * created with O_CREAT | O_EXCL ('wx'). Whoever creates it holds the lock;
 * everyone else sleeps and retries until it disappears or lockTimeoutMs
 * elapses. Release closes the handle and unlinks the marker.
 *
 * The whole API is synchronous. Waiting between attempts uses Atomics.wait,
 * which blocks the calling thread. It is legal on the Node.js main thread
 * (unlike the browser main thread).
 *
 * The lock is cooperative: it only excludes other writers that go through
 * withFileLock() on the same path.
 *
 * There is no stale-lock detection. A writer that dies while holding the lock
 * leaves its marker behind, and every later writer times out until the marker
 * is removed by hand. The marker's content is the owner's pid, so an operator
 * can check whether that process is still alive before deleting it.
 */

import { closeSync, openSync, unlinkSync, writeSync } from 'node:fs';

import { LOCK_SUFFIX } from './constants';
import type { Logger } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/** Thrown when the marker is still held after lockTimeoutMs. */
export class LockTimeoutError extends Error {
  readonly lockPath: string;

  constructor(lockPath: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs} ms acquiring lock at ${lockPath}`);
    this.name = 'LockTimeoutError';
    this.lockPath = lockPath;
  }
}

// ─── Internal helpers ─────────────────────────────────────────────────────────

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

// One shared cell; nothing ever notifies it, so every wait runs to its timeout.
const sleepCell = new Int32Array(new SharedArrayBuffer(4));

function sleepSync(ms: number): void {
  Atomics.wait(sleepCell, 0, 0, ms);
}

// ─── FileLock ─────────────────────────────────────────────────────────────────

export interface FileLockConfig {
  readonly path:      string;
  readonly retryMs:   number;
  readonly timeoutMs: number;
  readonly logger:    Logger;
}

export class FileLock {
  private fd: number | null = null;
  private readonly config: FileLockConfig;

  constructor(config: FileLockConfig) {
    this.config = config;
  }

  /** Block until the marker is created. Throws LockTimeoutError on timeout. */
  acquire(): void {
    const { path, retryMs, timeoutMs, logger } = this.config;
    const start  = Date.now();
    let   warned = false;

    while (true) {
      try {
        this.fd = openSync(path, 'wx');
      } catch (error) {
        if (!hasCode(error, 'EEXIST')) {
          throw error;
        }
      }

      if (this.fd !== null) {
        // Owner pid; nothing here reads it back.
        try {
          writeSync(this.fd, String(process.pid));
        } catch (error) {
          this.release();
          throw error;
        }
        return;
      }

      const waited = Date.now() - start;
      if (waited >= timeoutMs) {
        throw new LockTimeoutError(path, timeoutMs);
      }

      if (!warned && waited >= timeoutMs / 2) {
        logger.warn(`still waiting for ${path} after ${waited} ms`);
        warned = true;
      } else {
        logger.debug(`lock ${path} is held; retrying in ${retryMs} ms`);
      }

      sleepSync(Math.min(retryMs, timeoutMs - waited));
    }
  }

  /** Close and remove the marker. A marker already gone is not an error. */
  release(): void {
    const fd = this.fd;
    this.fd = null;

    if (fd !== null) {
      closeSync(fd);
    }

    try {
      unlinkSync(this.config.path);
    } catch (error) {
      if (!hasCode(error, 'ENOENT')) {
        throw error;
      }
    }
  }
}

// ─── withFileLock ─────────────────────────────────────────────────────────────

export function lockPathFor(path: string): string {
  return path + LOCK_SUFFIX;
}

/**
 * Run `action` while holding the lock for `path`. The lock is released on
 * every exit path, including a throw from `action`.
 */
export function withFileLock<T>(
  path:    string,
  options: { retryMs: number; timeoutMs: number; logger: Logger },
  action:  () => T,
): T {
  const lock = new FileLock({ path: lockPathFor(path), ...options });

  lock.acquire();
  try {
    return action();
  } finally {
    lock.release();
  }
}
