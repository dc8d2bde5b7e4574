/**
 * Engine assembly shared by every front end (HTTP gateway, MCP server, CLI).
 * Builds the registry, sandbox, executor, audit trail and coordinator from a
 * validated config.
 */

import { mkdirSync, realpathSync } from 'node:fs';
import path from 'node:path';
import { auditDbPath, loadConfig, toResourceLimits, type Config } from './config/index.js';
import { createAuditLogger, createPinoAuditSink, createSqliteAuditSink, type AuditLogger, type AuditSink } from './audit/index.js';
import {
  createExecutionCoordinator,
  createExecutionMetrics,
  createProcessExecutor,
  type ExecutionCoordinator,
  type Executor,
} from './execution/index.js';
import { createDatabase, type DatabaseManager } from './persistence/index.js';
import { createToolProber, createToolRegistry, type ToolRegistry } from './registry/index.js';
import { createSandboxEnvironmentBuilder } from './security/index.js';
import type { ResourceLimits } from './types/index.js';
import { PersistenceError, errorMessage } from './errors.js';
import { createModuleLogger } from './utils/logger.js';
import { VERSION } from './version.js';

const log = createModuleLogger('startup');

export interface Engine {
  readonly config: Config;
  readonly limits: ResourceLimits;
  readonly registry: ToolRegistry;
  readonly audit: AuditLogger;
  readonly coordinator: ExecutionCoordinator;
  /** Null when the SQLite audit sink is disabled */
  readonly dbManager: DatabaseManager | null;
  /** Flush pending audit writes and close the database. */
  close(): Promise<void>;
}

export interface EngineOptions {
  /** Override the audit database path (e.g. ':memory:' for tests) */
  dbPath?: string;
  /** Probe every tool before returning (default true) */
  probeTools?: boolean;
  /** Replace the child-process executor */
  executor?: Executor;
}

/**
 * Create the sandbox root if needed and return its canonical path.
 * Tools run with HOME pointing here, so it must exist before the first spawn.
 */
export function prepareSandboxRoot(root: string): string {
  try {
    mkdirSync(root, { recursive: true, mode: 0o700 });
    return realpathSync(root);
  } catch (error: unknown) {
    throw new PersistenceError(`Cannot prepare sandbox root "${root}": ${errorMessage(error)}`);
  }
}

/** Open the audit database, creating its directory first, and migrate it. */
function openAuditDatabase(dbPath: string): DatabaseManager {
  if (dbPath !== ':memory:') {
    try {
      mkdirSync(path.dirname(dbPath), { recursive: true, mode: 0o700 });
    } catch (error: unknown) {
      throw new PersistenceError(`Cannot create audit directory for "${dbPath}": ${errorMessage(error)}`);
    }
  }
  const manager = createDatabase(dbPath);
  try {
    manager.runMigrations();
  } catch (error: unknown) {
    manager.close();
    throw error;
  }
  return manager;
}

/**
 * Build the execution engine.
 * An audit database that cannot be opened leaves the log sink running and
 * audit health degraded.
 *
 * @throws {RegistryError} When the extra tool list is invalid
 * @throws {PersistenceError} When the sandbox root cannot be prepared
 */
export async function createEngine(config: Config, options: EngineOptions = {}): Promise<Engine> {
  const sandboxRoot = prepareSandboxRoot(config.sandbox.root);
  const limits: ResourceLimits = Object.freeze({ ...toResourceLimits(config), sandboxRoot });

  const executor = options.executor ?? createProcessExecutor();
  const registry = createToolRegistry({
    extraTools: config.tools.extra,
    prober: createToolProber({
      executor,
      searchPath: config.sandbox.path,
      workdir: sandboxRoot,
      timeoutMs: config.tools.probeTimeoutMs,
    }),
  });

  const sinks: AuditSink[] = [createPinoAuditSink()];
  let sqliteError: unknown = null;
  let dbManager: DatabaseManager | null = null;
  if (config.audit.sqlite) {
    try {
      dbManager = openAuditDatabase(options.dbPath ?? auditDbPath());
      sinks.push(createSqliteAuditSink(dbManager.db));
    } catch (error: unknown) {
      sqliteError = error;
      log.error({ error: errorMessage(error) }, 'Audit database unavailable, continuing with the log sink only');
    }
  }
  const audit = createAuditLogger(sinks);
  if (sqliteError !== null) {
    audit.reportFailure('sqlite', sqliteError);
  }

  const coordinator = createExecutionCoordinator({
    registry,
    envBuilder: createSandboxEnvironmentBuilder({
      limits,
      searchPath: config.sandbox.path,
      envAllowlist: config.sandbox.envAllowlist,
    }),
    executor,
    audit,
    metrics: createExecutionMetrics(),
  });

  if (options.probeTools ?? true) {
    await registry.refreshAll();
  }

  log.info(
    { version: VERSION, sandboxRoot, tools: registry.status().tools, available: registry.status().available },
    'Execution engine ready',
  );

  return {
    config,
    limits,
    registry,
    audit,
    coordinator,
    dbManager,

    async close(): Promise<void> {
      await audit.flush();
      dbManager?.close();
    },
  };
}

/**
 * Re-read the config file and swap in its extra tool list.
 * Resolves false when the file or the list is invalid; the current catalog stays active.
 */
export async function reloadExtraTools(engine: Engine): Promise<boolean> {
  let config: Config;
  try {
    config = await loadConfig();
  } catch (error: unknown) {
    log.error({ error: errorMessage(error) }, 'Config reload failed, keeping current catalog');
    return false;
  }
  return engine.registry.reload(config.tools.extra);
}
