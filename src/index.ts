/**
 * toolwarden main entry point.
 * Wires config, the execution engine and the front ends together, and
 * registers shutdown handlers for graceful termination.
 */

import { loadConfig, type Config } from './config/index.js';
import { createGatewayServer, type GatewayServer } from './gateway/index.js';
import { runMcpStdioServer } from './mcp/index.js';
import { createEngine, reloadExtraTools, type Engine } from './startup.js';
import { createShutdownHandler, type ShutdownHandler } from './utils/shutdown.js';
import { createModuleLogger } from './utils/logger.js';
import { errorMessage } from './errors.js';

export { VERSION } from './version.js';
export { createEngine, reloadExtraTools, type Engine, type EngineOptions } from './startup.js';
export { createExecutionCoordinator, type ExecutionCoordinator } from './execution/index.js';
export type {
  CatalogEntry,
  ExecutionInput,
  ExecutionOutcome,
  ExecutionRejection,
  ExecutionResponse,
  ExecutionResult,
  ToolDescriptor,
} from './types/index.js';

const log = createModuleLogger('main');

export interface AppContext {
  config: Config;
  engine: Engine;
  gateway: GatewayServer;
  shutdownHandler: ShutdownHandler;
}

/** Options for starting the app, allowing dependency injection for tests. */
export interface StartOptions {
  /** Override config instead of loading from disk. */
  config?: Config;
  /** Override the audit database path (e.g. ':memory:' for tests). */
  dbPath?: string;
  /** Skip starting the gateway listener (useful in tests). */
  skipGatewayListen?: boolean;
  /** Skip registering process signal handlers (useful in tests). */
  skipSignalHandlers?: boolean;
  /** Skip availability probing (useful in tests). */
  skipProbe?: boolean;
}

/**
 * Reload the extra tool list from the config file on SIGHUP.
 */
function installReloadSignal(engine: Engine, shutdownHandler: ShutdownHandler): void {
  const onReload = (): void => {
    log.info('SIGHUP received, reloading tool list');
    reloadExtraTools(engine).catch((error: unknown) => {
      log.error({ error: errorMessage(error) }, 'Tool list reload failed');
    });
  };
  process.on('SIGHUP', onReload);
  shutdownHandler.register('reload-signal', () => {
    process.off('SIGHUP', onReload);
  });
}

/**
 * Start the HTTP gateway.
 */
export async function startApp(options: StartOptions = {}): Promise<AppContext> {
  const config = options.config ?? await loadConfig();

  const engine = await createEngine(config, {
    ...(options.dbPath !== undefined ? { dbPath: options.dbPath } : {}),
    probeTools: !options.skipProbe,
  });

  const gateway = createGatewayServer(engine);
  if (options.skipGatewayListen) {
    await gateway.app.ready();
  } else {
    await gateway.start(config.gateway.port, config.gateway.host);
  }

  const shutdownHandler = createShutdownHandler({ installSignalHandlers: !options.skipSignalHandlers });
  shutdownHandler.register('engine', () => engine.close());
  shutdownHandler.register('gateway', () => gateway.stop());
  if (!options.skipSignalHandlers) {
    installReloadSignal(engine, shutdownHandler);
  }

  log.info(
    { host: config.gateway.host, port: config.gateway.port, sandboxRoot: engine.limits.sandboxRoot },
    'toolwarden gateway running',
  );

  return { config, engine, gateway, shutdownHandler };
}

/**
 * Start the MCP server on stdio.
 */
export async function startMcp(options: Pick<StartOptions, 'config' | 'dbPath'> = {}): Promise<Engine> {
  const config = options.config ?? await loadConfig();
  const engine = await createEngine(config, options.dbPath !== undefined ? { dbPath: options.dbPath } : {});
  const server = await runMcpStdioServer(engine.coordinator);

  const shutdownHandler = createShutdownHandler();
  shutdownHandler.register('engine', () => engine.close());
  shutdownHandler.register('mcp', () => server.close());
  installReloadSignal(engine, shutdownHandler);

  return engine;
}
