/**
 * Audit log data access layer.
 * Appends and queries rows of the append-only audit_log table.
 */

import type BetterSqlite3 from 'better-sqlite3';
import type { AuditEvent, AuditEventKind } from '../types/index.js';
import { PersistenceError, errorMessage } from '../errors.js';
import { persistenceLogger } from '../utils/logger.js';

/** Application-level representation of an audit log entry. */
export interface AuditLogRow {
  id: number;
  requestId: string;
  kind: AuditEventKind;
  tool: string;
  detail: string;
  outcome: string | null;
  securityViolation: boolean;
  createdAt: Date;
}

/** Raw row shape from the audit_log table. */
interface AuditLogDbRow {
  id: number;
  request_id: string;
  kind: string;
  tool: string;
  detail: string;
  outcome: string | null;
  security_violation: number;
  created_at: string;
}

const EVENT_KINDS: readonly AuditEventKind[] = [
  'validation_failure',
  'security_violation',
  'execution_start',
  'execution_end',
];

function isEventKind(value: string): value is AuditEventKind {
  return EVENT_KINDS.some((kind) => kind === value);
}

function mapRow(row: AuditLogDbRow): AuditLogRow {
  if (!isEventKind(row.kind)) {
    throw new PersistenceError(`Unknown audit event kind in row ${row.id}: ${row.kind}`);
  }
  return {
    id: row.id,
    requestId: row.request_id,
    kind: row.kind,
    tool: row.tool,
    detail: row.detail,
    outcome: row.outcome,
    securityViolation: row.security_violation === 1,
    createdAt: new Date(row.created_at),
  };
}

/**
 * Append one audit event.
 * @returns The id of the inserted row.
 * @throws {PersistenceError} If the insert fails.
 */
export function appendAuditLog(db: BetterSqlite3.Database, event: AuditEvent): number {
  try {
    const result = db.prepare<[string, string, string, string, string | null, number, string]>(
      `INSERT INTO audit_log (request_id, kind, tool, detail, outcome, security_violation, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    ).run(
      event.requestId,
      event.kind,
      event.tool,
      event.detail,
      event.outcome ?? null,
      event.securityViolation === true ? 1 : 0,
      event.timestamp.toISOString(),
    );

    persistenceLogger.trace({ requestId: event.requestId, kind: event.kind }, 'Audit row appended');
    return Number(result.lastInsertRowid);
  } catch (error: unknown) {
    throw new PersistenceError(`Failed to append audit log: ${errorMessage(error)}`);
  }
}

/**
 * Recent audit entries, most recent first.
 * @throws {PersistenceError} If the query fails.
 */
export function getRecentAuditLogs(
  db: BetterSqlite3.Database,
  limit: number = 50,
  offset: number = 0,
): AuditLogRow[] {
  try {
    const rows = db.prepare<[number, number], AuditLogDbRow>(
      'SELECT * FROM audit_log ORDER BY id DESC LIMIT ? OFFSET ?',
    ).all(limit, offset);

    return rows.map(mapRow);
  } catch (error: unknown) {
    if (error instanceof PersistenceError) {
      throw error;
    }
    throw new PersistenceError(`Failed to get recent audit logs: ${errorMessage(error)}`);
  }
}

/**
 * Every entry for one request, in insertion order.
 * @throws {PersistenceError} If the query fails.
 */
export function getAuditLogsByRequest(db: BetterSqlite3.Database, requestId: string): AuditLogRow[] {
  try {
    const rows = db.prepare<[string], AuditLogDbRow>(
      'SELECT * FROM audit_log WHERE request_id = ? ORDER BY id ASC',
    ).all(requestId);

    return rows.map(mapRow);
  } catch (error: unknown) {
    if (error instanceof PersistenceError) {
      throw error;
    }
    throw new PersistenceError(`Failed to get audit logs by request: ${errorMessage(error)}`);
  }
}

/**
 * Count audit entries, optionally of one kind.
 * @throws {PersistenceError} If the query fails.
 */
export function countAuditLogs(db: BetterSqlite3.Database, kind?: AuditEventKind): number {
  try {
    const row = kind === undefined
      ? db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM audit_log').get()
      : db.prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM audit_log WHERE kind = ?').get(kind);

    return row?.count ?? 0;
  } catch (error: unknown) {
    throw new PersistenceError(`Failed to count audit logs: ${errorMessage(error)}`);
  }
}
