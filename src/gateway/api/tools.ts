/**
 * Tool catalog route handlers.
 * GET  /api/v1/tools: List every permitted tool.
 * GET  /api/v1/tools/:name: One tool's catalog entry.
 * POST /api/v1/tools/refresh: Re-probe availability and return the catalog.
 */

import type { FastifyInstance } from 'fastify';
import type { ExecutionCoordinator } from '../../execution/coordinator.js';
import type { ToolRegistry } from '../../registry/tool-registry.js';
import { errorMessage } from '../../errors.js';

interface ToolParams {
  name: string;
}

export function registerToolRoutes(
  app: FastifyInstance,
  coordinator: ExecutionCoordinator,
  registry: ToolRegistry,
): void {
  app.get('/api/v1/tools', async (_request, reply) => {
    const tools = coordinator.catalog();
    return reply.status(200).send({ tools, total: tools.length });
  });

  app.get<{ Params: ToolParams }>('/api/v1/tools/:name', async (request, reply) => {
    const descriptor = coordinator.describe(request.params.name);
    if (descriptor === undefined) {
      return reply.status(404).send({ error: 'Tool not found' });
    }
    return reply.status(200).send({
      name: descriptor.name,
      category: descriptor.category,
      description: descriptor.description,
      available: descriptor.available,
      version: descriptor.version,
      path: descriptor.binaryPath,
      default_timeout: descriptor.defaultTimeoutSec,
      last_probed_at: descriptor.lastProbedAt?.toISOString() ?? null,
    });
  });

  app.post('/api/v1/tools/refresh', async (_request, reply) => {
    try {
      await registry.refreshAll();
      const tools = coordinator.catalog();
      return reply.status(200).send({ tools, total: tools.length });
    } catch (error: unknown) {
      return reply.status(500).send({ error: 'Failed to refresh tools', detail: errorMessage(error) });
    }
  });
}
