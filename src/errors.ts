/**
 * toolwarden error type hierarchy.
 * All custom errors extend WardenError for consistent handling.
 *
 * Validation and execution failures are returned as values from the
 * coordinator; only infrastructure failures are thrown.
 */

/** Base error for all toolwarden errors */
export class WardenError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly userFacing: boolean = false,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = 'WardenError';
  }
}

/** Thrown when config validation fails */
export class ConfigError extends WardenError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', true, false);
    this.name = 'ConfigError';
  }
}

/** Thrown when the tool registry cannot be built or reloaded */
export class RegistryError extends WardenError {
  constructor(message: string) {
    super(message, 'REGISTRY_ERROR', false, false);
    this.name = 'RegistryError';
  }
}

/** Thrown when an audit sink cannot accept an event */
export class AuditSinkError extends WardenError {
  constructor(
    message: string,
    public readonly sink: string,
  ) {
    super(message, 'AUDIT_SINK_ERROR', false, true);
    this.name = 'AuditSinkError';
  }
}

/** Thrown when a persistence/database operation fails */
export class PersistenceError extends WardenError {
  constructor(message: string) {
    super(message, 'PERSISTENCE_ERROR', false, true);
    this.name = 'PersistenceError';
  }
}

/** Extract a printable message from an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
