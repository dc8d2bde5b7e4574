/**
 * Transport shapes shared by the HTTP gateway, the MCP server and the CLI.
 */

import type { ExecutionOutcome, ExecutionRejection, ExecutionResult, ValidationErrorKind } from '../types/index.js';

export interface WireResult {
  request_id: string;
  tool: string;
  stdout: string;
  stderr: string;
  return_code: number | null;
  duration_ms: number;
  truncated: boolean;
  outcome: ExecutionOutcome;
  message?: string;
}

export interface WireRejection {
  error: string;
  kind: ValidationErrorKind;
  request_id: string;
}

export function toWireResult(result: ExecutionResult): WireResult {
  return {
    request_id: result.requestId,
    tool: result.tool,
    stdout: result.stdout,
    stderr: result.stderr,
    return_code: result.returnCode,
    duration_ms: result.durationMs,
    truncated: result.truncated,
    outcome: result.outcome,
    ...(result.message !== undefined ? { message: result.message } : {}),
  };
}

export function toWireRejection(rejection: ExecutionRejection): WireRejection {
  return {
    error: rejection.message,
    kind: rejection.error,
    request_id: rejection.requestId,
  };
}
