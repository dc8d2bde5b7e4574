/**
 * Audit trail barrel export.
 */

export { createAuditLogger, type AuditLogger } from './audit-logger.js';
export { createPinoAuditSink, createSqliteAuditSink, type AuditLogTarget, type AuditSink } from './sinks.js';
