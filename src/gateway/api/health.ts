/**
 * Health and metrics route handlers.
 * GET /api/v1/health: status, uptime, version, audit sink and registry state.
 * GET /api/v1/metrics: execution counters and the active limits.
 */

import type { FastifyInstance } from 'fastify';
import type { ExecutionCoordinator } from '../../execution/coordinator.js';
import type { ResourceLimits } from '../../types/index.js';

/**
 * Register the health and metrics endpoints.
 * Health answers 200 even when degraded; the body carries the status.
 */
export function registerHealthRoutes(
  app: FastifyInstance,
  coordinator: ExecutionCoordinator,
  limits: ResourceLimits,
): void {
  app.get('/api/v1/health', async (_request, reply) => {
    return reply.status(200).send(coordinator.health());
  });

  app.get('/api/v1/metrics', async (_request, reply) => {
    return reply.status(200).send({ ...coordinator.metrics(), limits });
  });
}
