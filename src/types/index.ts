/**
 * Canonical interface definitions for toolwarden.
 * All shared types live here and are imported throughout the project.
 */

// === Tools ===

export type ToolCategory =
  | 'network_scanning'
  | 'web'
  | 'password'
  | 'wireless'
  | 'exploitation'
  | 'enumeration'
  | 'dns'
  | 'diagnostics'
  | 'custom';

/** A permitted tool. Replaced as a whole, never mutated. */
export interface ToolDescriptor {
  readonly name: string;
  /** Absolute path of the executable once probed, null before or when missing */
  readonly binaryPath: string | null;
  /** Executable name looked up on the sandbox PATH (usually equal to name) */
  readonly binary: string;
  readonly category: ToolCategory;
  readonly description: string;
  readonly defaultTimeoutSec: number | null;
  readonly available: boolean;
  readonly version: string | null;
  readonly lastProbedAt: Date | null;
}

/** Public catalog entry returned to callers */
export interface CatalogEntry {
  name: string;
  category: ToolCategory;
  available: boolean;
  version: string | null;
}

// === Requests ===

/** Raw request as received from a front end */
export interface ExecutionInput {
  tool: string;
  args?: readonly unknown[];
  timeoutSec?: number;
  workingDir?: string;
}

export interface ExecutionRequest {
  readonly requestId: string;
  readonly tool: string;
  readonly args: readonly string[];
  readonly timeoutSec?: number;
  readonly workingDir?: string;
  readonly createdAt: Date;
}

// === Limits ===

/** Process-wide limits, frozen at startup */
export interface ResourceLimits {
  readonly maxTimeoutSec: number;
  readonly defaultTimeoutSec: number;
  readonly maxOutputBytes: number;
  readonly sandboxRoot: string;
  readonly killGraceMs: number;
}

/** Limits applied to a single execution */
export interface EffectiveLimits {
  readonly timeoutMs: number;
  readonly maxOutputBytes: number;
  readonly killGraceMs: number;
}

// === Results ===

export type ExecutionOutcome = 'success' | 'tool_error' | 'timed_out' | 'killed' | 'spawn_failed';

export type ValidationErrorKind =
  | 'InvalidToolName'
  | 'DisallowedArgument'
  | 'PathEscapesSandbox'
  | 'WorkingDirectoryNotFound';

export interface ExecutionResult {
  readonly status: 'executed';
  readonly requestId: string;
  readonly tool: string;
  readonly stdout: string;
  readonly stderr: string;
  readonly returnCode: number | null;
  readonly durationMs: number;
  readonly truncated: boolean;
  readonly outcome: ExecutionOutcome;
  /** Sanitized, caller-safe explanation for non-success outcomes */
  readonly message?: string;
}

export interface ExecutionRejection {
  readonly status: 'rejected';
  readonly requestId: string;
  readonly tool: string;
  readonly error: ValidationErrorKind;
  readonly securityViolation: boolean;
  readonly message: string;
}

export type ExecutionResponse = ExecutionResult | ExecutionRejection;

// === Audit ===

export type AuditEventKind =
  | 'validation_failure'
  | 'security_violation'
  | 'execution_start'
  | 'execution_end';

export interface AuditEvent {
  readonly kind: AuditEventKind;
  readonly requestId: string;
  readonly tool: string;
  readonly detail: string;
  readonly timestamp: Date;
  readonly outcome?: ExecutionOutcome | ValidationErrorKind;
  readonly securityViolation?: boolean;
}

// === Health & metrics ===

export interface AuditHealth {
  healthy: boolean;
  failedWrites: number;
  lastError: string | null;
  lastFailureAt: Date | null;
}

export interface LastError {
  requestId: string;
  tool: string;
  message: string;
  at: Date;
}

export interface MetricsSnapshot {
  totalExecutions: number;
  totalRejections: number;
  perTool: Record<string, number>;
  perOutcome: Record<ExecutionOutcome, number>;
  rejectionsByKind: Record<ValidationErrorKind, number>;
  failures: number;
  cumulativeDurationMs: number;
  inFlight: number;
  lastError: LastError | null;
}

export interface HealthData {
  status: 'ok' | 'degraded';
  uptime: number;
  version: string;
  auditSink: AuditHealth;
  registry: {
    tools: number;
    available: number;
    lastReloadError: string | null;
  };
}
