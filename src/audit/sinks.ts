/**
 * Audit sinks: destinations for audit events.
 */

import type BetterSqlite3 from 'better-sqlite3';
import type pino from 'pino';
import type { AuditEvent } from '../types/index.js';
import { AuditSinkError, errorMessage } from '../errors.js';
import { appendAuditLog } from '../persistence/audit-log.js';
import { auditEventLogger } from '../utils/logger.js';

/** The part of a pino logger the log sink writes through */
export type AuditLogTarget = Pick<pino.Logger, 'info' | 'warn'>;

export interface AuditSink {
  readonly name: string;
  /** Persist one event. Throws or rejects on failure. */
  write(event: AuditEvent): void | Promise<void>;
}

/**
 * One structured log line per event through the `audit` module logger.
 * Violations and rejections are logged at warn.
 */
export function createPinoAuditSink(target: AuditLogTarget = auditEventLogger): AuditSink {
  return {
    name: 'pino',
    write(event: AuditEvent): void {
      const fields = {
        event: event.kind,
        requestId: event.requestId,
        tool: event.tool,
        detail: event.detail,
        outcome: event.outcome,
        securityViolation: event.securityViolation,
        timestamp: event.timestamp.toISOString(),
      };
      if (event.kind === 'security_violation' || event.kind === 'validation_failure') {
        target.warn(fields, `audit: ${event.kind}`);
      } else {
        target.info(fields, `audit: ${event.kind}`);
      }
    },
  };
}

/** Row per event in the audit_log table. */
export function createSqliteAuditSink(db: BetterSqlite3.Database): AuditSink {
  return {
    name: 'sqlite',
    write(event: AuditEvent): void {
      try {
        appendAuditLog(db, event);
      } catch (error: unknown) {
        throw new AuditSinkError(errorMessage(error), 'sqlite');
      }
    },
  };
}
