/**
 * Audit Logger
 *
 * `record` enqueues and returns at once. Writes run later, one at a time
 * behind the write mutex, so events reach every sink in the order they were
 * recorded. A failing sink degrades health and never reaches the caller.
 */

import type { AuditEvent, AuditHealth } from '../types/index.js';
import { errorMessage } from '../errors.js';
import { createWriteMutex } from '../persistence/write-mutex.js';
import { createModuleLogger } from '../utils/logger.js';
import type { AuditSink } from './sinks.js';

const log = createModuleLogger('audit-logger');

export interface AuditLogger {
  record(event: AuditEvent): void;
  health(): AuditHealth;
  /** Degrade health for a sink that could not be brought up. */
  reportFailure(sink: string, error: unknown): void;
  /** Resolves once every event recorded before the call has been written. */
  flush(): Promise<void>;
}

export function createAuditLogger(sinks: readonly AuditSink[]): AuditLogger {
  const mutex = createWriteMutex();
  const state: AuditHealth = {
    healthy: true,
    failedWrites: 0,
    lastError: null,
    lastFailureAt: null,
  };
  let tail: Promise<void> = Promise.resolve();

  const degrade = (sink: string, error: unknown): string => {
    const message = `${sink}: ${errorMessage(error)}`;
    state.healthy = false;
    state.lastError = message;
    state.lastFailureAt = new Date();
    return message;
  };

  const markFailure = (sink: string, event: AuditEvent, error: unknown): void => {
    const message = degrade(sink, error);
    state.failedWrites++;
    log.error({ sink, requestId: event.requestId, kind: event.kind, error: message }, 'Audit sink write failed');
  };

  const writeAll = async (event: AuditEvent): Promise<void> => {
    for (const sink of sinks) {
      try {
        await sink.write(event);
      } catch (error: unknown) {
        markFailure(sink.name, event, error);
      }
    }
  };

  return {
    record(event: AuditEvent): void {
      tail = mutex
        .withLock(() => writeAll(event))
        .catch((error: unknown) => markFailure('audit-queue', event, error));
    },

    health(): AuditHealth {
      return { ...state };
    },

    reportFailure(sink: string, error: unknown): void {
      const message = degrade(sink, error);
      log.error({ sink, error: message }, 'Audit sink unavailable');
    },

    flush(): Promise<void> {
      return tail;
    },
  };
}
