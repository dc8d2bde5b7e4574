/**
 * Execution route handler.
 * POST /api/v1/run: Run one permitted tool.
 *
 * 200 for every executed request, whatever its outcome; 403 for security
 * violations and 400 for other rejections.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ExecutionCoordinator } from '../../execution/coordinator.js';
import { toWireRejection, toWireResult } from '../../execution/wire.js';
import { errorMessage } from '../../errors.js';
import { gatewayLogger } from '../../utils/logger.js';

export const RunBodySchema = z.object({
  tool: z.string().min(1),
  args: z.array(z.string()).default([]),
  timeout: z.number().int().positive().optional(),
  working_dir: z.string().min(1).optional(),
});

export function registerRunRoutes(app: FastifyInstance, coordinator: ExecutionCoordinator): void {
  app.post('/api/v1/run', async (request, reply) => {
    const parsed = RunBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({
        error: 'Invalid request body',
        detail: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      });
    }

    const body = parsed.data;
    try {
      const response = await coordinator.execute({
        tool: body.tool,
        args: body.args,
        ...(body.timeout !== undefined ? { timeoutSec: body.timeout } : {}),
        ...(body.working_dir !== undefined ? { workingDir: body.working_dir } : {}),
      });

      if (response.status === 'rejected') {
        return reply.status(response.securityViolation ? 403 : 400).send(toWireRejection(response));
      }
      return reply.status(200).send(toWireResult(response));
    } catch (error: unknown) {
      gatewayLogger.error({ tool: body.tool, error: errorMessage(error) }, 'Run request failed');
      return reply.status(500).send({ error: 'Execution failed' });
    }
  });
}
