/**
 * Fastify HTTP gateway in front of the execution engine.
 * Registers CORS and the REST API routes; start() and stop() manage the listener.
 * Routes only translate payloads: every decision belongs to the coordinator.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import fastifyCors from '@fastify/cors';
import type { Engine } from '../startup.js';
import { errorMessage } from '../errors.js';
import { gatewayLogger } from '../utils/logger.js';
import { registerHealthRoutes } from './api/health.js';
import { registerToolRoutes } from './api/tools.js';
import { registerRunRoutes } from './api/run.js';
import { registerAuditRoutes } from './api/audit.js';

const log = gatewayLogger;

export interface GatewayServer {
  /** The underlying Fastify instance (useful for testing via inject()). */
  readonly app: FastifyInstance;
  start(port: number, host?: string): Promise<void>;
  stop(): Promise<void>;
}

export interface GatewayOptions {
  corsOrigins?: readonly string[];
}

/**
 * Create and configure the gateway server. Nothing listens until start().
 */
export function createGatewayServer(engine: Engine, options: GatewayOptions = {}): GatewayServer {
  const app = Fastify({
    logger: false,
    forceCloseConnections: true,
    bodyLimit: 1_048_576,
  });

  const origins = options.corsOrigins ?? engine.config.gateway.corsOrigins;
  app.register(fastifyCors, {
    origin: origins.includes('*') ? true : [...origins],
    methods: ['GET', 'POST', 'OPTIONS'],
  });

  app.setErrorHandler((error, request, reply) => {
    log.error({ method: request.method, url: request.url, error: error.message }, 'Unhandled route error');
    const statusCode = error.statusCode !== undefined && error.statusCode < 500 ? error.statusCode : 500;
    return reply.status(statusCode).send({ error: statusCode === 500 ? 'Internal server error' : error.message });
  });

  registerHealthRoutes(app, engine.coordinator, engine.limits);
  registerToolRoutes(app, engine.coordinator, engine.registry);
  registerRunRoutes(app, engine.coordinator);
  if (engine.config.gateway.exposeAudit) {
    registerAuditRoutes(app, engine.dbManager?.db ?? null);
  }

  return {
    get app(): FastifyInstance {
      return app;
    },

    async start(port: number, host: string = '127.0.0.1'): Promise<void> {
      try {
        await app.listen({ port, host });
        log.info({ port, host }, 'Gateway server started');
      } catch (error: unknown) {
        log.error({ error: errorMessage(error) }, 'Failed to start gateway server');
        throw error;
      }
    },

    async stop(): Promise<void> {
      try {
        await app.close();
        log.info('Gateway server stopped');
      } catch (error: unknown) {
        log.error({ error: errorMessage(error) }, 'Error stopping gateway server');
        throw error;
      }
    },
  };
}
