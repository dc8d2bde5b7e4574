/**
 * Persistence layer public API.
 */

export { createDatabase } from './db.js';
export type { DatabaseManager } from './db.js';
export { createWriteMutex } from './write-mutex.js';
export type { WriteMutex } from './write-mutex.js';
export { appendAuditLog, getRecentAuditLogs, getAuditLogsByRequest, countAuditLogs } from './audit-log.js';
export type { AuditLogRow } from './audit-log.js';
