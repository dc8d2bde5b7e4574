/**
 * Aggregate execution counters.
 * Updates happen on the event loop thread between awaits, so each one is atomic.
 */

import type {
  ExecutionOutcome,
  ExecutionRejection,
  ExecutionResult,
  LastError,
  MetricsSnapshot,
  ValidationErrorKind,
} from '../types/index.js';

export interface ExecutionMetrics {
  executionStarted(): void;
  executionFinished(result: ExecutionResult): void;
  rejected(rejection: ExecutionRejection): void;
  snapshot(): MetricsSnapshot;
}

function emptyOutcomes(): Record<ExecutionOutcome, number> {
  return { success: 0, tool_error: 0, timed_out: 0, killed: 0, spawn_failed: 0 };
}

function emptyRejections(): Record<ValidationErrorKind, number> {
  return { InvalidToolName: 0, DisallowedArgument: 0, PathEscapesSandbox: 0, WorkingDirectoryNotFound: 0 };
}

export function createExecutionMetrics(): ExecutionMetrics {
  let totalExecutions = 0;
  let totalRejections = 0;
  let failures = 0;
  let cumulativeDurationMs = 0;
  let inFlight = 0;
  let lastError: LastError | null = null;
  const perTool = new Map<string, number>();
  const perOutcome = emptyOutcomes();
  const rejectionsByKind = emptyRejections();

  return {
    executionStarted(): void {
      inFlight++;
    },

    executionFinished(result: ExecutionResult): void {
      inFlight = Math.max(inFlight - 1, 0);
      totalExecutions++;
      cumulativeDurationMs += result.durationMs;
      perTool.set(result.tool, (perTool.get(result.tool) ?? 0) + 1);
      perOutcome[result.outcome]++;

      if (result.outcome !== 'success') {
        failures++;
        lastError = {
          requestId: result.requestId,
          tool: result.tool,
          message: result.message ?? result.outcome,
          at: new Date(),
        };
      }
    },

    rejected(rejection: ExecutionRejection): void {
      totalRejections++;
      rejectionsByKind[rejection.error]++;
    },

    snapshot(): MetricsSnapshot {
      return {
        totalExecutions,
        totalRejections,
        perTool: Object.fromEntries(perTool),
        perOutcome: { ...perOutcome },
        rejectionsByKind: { ...rejectionsByKind },
        failures,
        cumulativeDurationMs,
        inFlight,
        lastError: lastError === null ? null : { ...lastError },
      };
    },
  };
}
