/**
 * Audit log route handler.
 * GET /api/v1/audit: Recent audit entries from the SQLite sink.
 */

import type { FastifyInstance } from 'fastify';
import type BetterSqlite3 from 'better-sqlite3';
import { countAuditLogs, getRecentAuditLogs } from '../../persistence/audit-log.js';
import { errorMessage } from '../../errors.js';

interface AuditQuerystring {
  limit?: string;
  offset?: string;
}

const MAX_PAGE_SIZE = 500;

function parseBounded(raw: string | undefined, fallback: number, max: number): number {
  const parsed = raw === undefined ? Number.NaN : Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return fallback;
  }
  return Math.min(parsed, max);
}

/**
 * Register the audit endpoint. Without a database it answers 404.
 */
export function registerAuditRoutes(app: FastifyInstance, db: BetterSqlite3.Database | null): void {
  app.get<{ Querystring: AuditQuerystring }>('/api/v1/audit', async (request, reply) => {
    if (db === null) {
      return reply.status(404).send({ error: 'SQLite audit sink is disabled' });
    }
    try {
      const limit = parseBounded(request.query.limit, 50, MAX_PAGE_SIZE);
      const offset = parseBounded(request.query.offset, 0, Number.MAX_SAFE_INTEGER);

      const entries = getRecentAuditLogs(db, limit, offset);
      return reply.status(200).send({ entries, count: entries.length, total: countAuditLogs(db) });
    } catch (error: unknown) {
      return reply.status(500).send({ error: 'Failed to retrieve audit log', detail: errorMessage(error) });
    }
  });
}
