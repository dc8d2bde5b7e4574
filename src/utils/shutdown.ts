/**
 * Graceful shutdown handler.
 * Cleanup functions run in reverse registration order, bounded by a timeout.
 */

import { createModuleLogger } from './logger.js';
import { errorMessage } from '../errors.js';

const log = createModuleLogger('shutdown');

const SHUTDOWN_TIMEOUT_MS = 10_000;

export type CleanupFunction = () => Promise<void> | void;

interface CleanupEntry {
  label: string;
  fn: CleanupFunction;
}

export interface ShutdownHandler {
  register(label: string, fn: CleanupFunction): void;
  /** Run every cleanup once; later calls resolve immediately. */
  shutdown(): Promise<void>;
  isShuttingDown(): boolean;
}

export interface ShutdownOptions {
  /** Listen for SIGINT and SIGTERM and exit after cleanup (default true) */
  installSignalHandlers?: boolean;
  timeoutMs?: number;
}

/**
 * Create a shutdown handler.
 *
 * @example
 * ```ts
 * const handler = createShutdownHandler();
 * handler.register('database', () => dbManager.close());
 * handler.register('gateway', () => gateway.stop());
 * // On SIGINT/SIGTERM the gateway stops first, then the database closes.
 * ```
 */
export function createShutdownHandler(options: ShutdownOptions = {}): ShutdownHandler {
  const entries: CleanupEntry[] = [];
  const timeoutMs = options.timeoutMs ?? SHUTDOWN_TIMEOUT_MS;
  let shuttingDown = false;

  function register(label: string, fn: CleanupFunction): void {
    entries.push({ label, fn });
    log.debug({ label }, 'Registered cleanup function');
  }

  async function shutdown(): Promise<void> {
    if (shuttingDown) {
      log.warn('Shutdown already in progress');
      return;
    }
    shuttingDown = true;
    log.info('Shutdown initiated');

    const forceExitTimer = setTimeout(() => {
      log.error({ timeoutMs }, 'Shutdown timed out, forcing exit');
      process.exit(1);
    }, timeoutMs);
    forceExitTimer.unref();

    for (const entry of [...entries].reverse()) {
      try {
        await entry.fn();
        log.debug({ label: entry.label }, 'Cleanup completed');
      } catch (error: unknown) {
        log.error({ label: entry.label, error: errorMessage(error) }, 'Cleanup failed');
      }
    }

    clearTimeout(forceExitTimer);
    log.info('Cleanup complete');
  }

  if (options.installSignalHandlers ?? true) {
    const signalHandler = (): void => {
      void shutdown().then(() => process.exit(0));
    };
    process.once('SIGINT', signalHandler);
    process.once('SIGTERM', signalHandler);
  }

  return {
    register,
    shutdown,
    isShuttingDown: () => shuttingDown,
  };
}
