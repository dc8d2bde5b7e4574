/**
 * Write mutex: serializes writes to a single-writer resource.
 * Callers wait in FIFO order, so writes land in the order they were queued.
 */

import { createModuleLogger } from '../utils/logger.js';

const log = createModuleLogger('write-mutex');

type Release = () => void;

export interface WriteMutex {
  /**
   * Acquire the lock. If already held, the returned promise resolves once all
   * preceding callers have released.
   * @returns A release function that MUST be called when done.
   */
  acquire(): Promise<Release>;

  /** Run fn while holding the lock; releases even if fn throws. */
  withLock<T>(fn: () => T | Promise<T>): Promise<T>;

  /** Callers currently waiting for the lock. */
  readonly pending: number;
}

export function createWriteMutex(): WriteMutex {
  let locked = false;
  const waiters: Array<(release: Release) => void> = [];

  function release(): void {
    const next = waiters.shift();
    if (next === undefined) {
      locked = false;
      return;
    }
    // Stay locked and hand off
    log.trace({ queueLength: waiters.length }, 'Mutex handed to next waiter');
    next(release);
  }

  async function acquire(): Promise<Release> {
    if (!locked) {
      locked = true;
      return release;
    }
    return new Promise<Release>((resolve) => {
      waiters.push(resolve);
    });
  }

  return {
    acquire,

    async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
      const releaseFn = await acquire();
      try {
        return await fn();
      } finally {
        releaseFn();
      }
    },

    get pending(): number {
      return waiters.length;
    },
  };
}
