/**
 * Execution Coordinator
 *
 * Entry point for every request: validate, build the sandbox, spawn, wait,
 * audit, answer. Validation failures come back as ExecutionRejection values
 * and never reach the executor. Every request produces exactly one terminal
 * audit event (`validation_failure` or `execution_end`).
 */

import { nanoid } from 'nanoid';
import type {
  AuditEventKind,
  CatalogEntry,
  EffectiveLimits,
  ExecutionInput,
  ExecutionOutcome,
  ExecutionRejection,
  ExecutionRequest,
  ExecutionResponse,
  ExecutionResult,
  HealthData,
  MetricsSnapshot,
  ToolDescriptor,
} from '../types/index.js';
import type { AuditLogger } from '../audit/audit-logger.js';
import type { ToolRegistry } from '../registry/tool-registry.js';
import type { SandboxEnvironmentBuilder } from '../security/environment.js';
import { sanitizeArguments, validateToolName, type ValidationFailure } from '../security/validator.js';
import { errorMessage } from '../errors.js';
import { executionLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';
import type { Executor, ProcessOutcome } from './process-executor.js';
import type { ExecutionMetrics } from './metrics.js';

const log = executionLogger;

/** Shown to callers instead of the OS error, which stays in the audit trail */
export const SPAWN_FAILED_MESSAGE = 'Tool could not be started';

export interface CoordinatorContext {
  registry: ToolRegistry;
  envBuilder: SandboxEnvironmentBuilder;
  executor: Executor;
  audit: AuditLogger;
  metrics: ExecutionMetrics;
  /** Request id generator; defaults to nanoid */
  generateId?: () => string;
}

export interface ExecutionCoordinator {
  /** Never rejects. */
  execute(input: ExecutionInput): Promise<ExecutionResponse>;
  catalog(): CatalogEntry[];
  describe(name: string): ToolDescriptor | undefined;
  health(): HealthData;
  metrics(): MetricsSnapshot;
}

/** Map a process outcome to the caller-facing outcome. */
export function classifyOutcome(outcome: ProcessOutcome): ExecutionOutcome {
  switch (outcome.state) {
    case 'completed':
      return outcome.returnCode === 0 ? 'success' : 'tool_error';
    case 'timed_out':
      return 'timed_out';
    case 'killed':
      return 'killed';
    case 'spawn_failed':
      return 'spawn_failed';
  }
}

function outcomeMessage(outcome: ExecutionOutcome, processOutcome: ProcessOutcome, limits: EffectiveLimits): string | undefined {
  switch (outcome) {
    case 'success':
      return undefined;
    case 'tool_error':
      return `Tool exited with code ${processOutcome.returnCode ?? 'unknown'}`;
    case 'timed_out':
      return `Execution timed out after ${limits.timeoutMs / 1000} seconds`;
    case 'killed':
      return `Tool was terminated by signal ${processOutcome.signal ?? 'unknown'}`;
    case 'spawn_failed':
      return SPAWN_FAILED_MESSAGE;
  }
}

export function createExecutionCoordinator(context: CoordinatorContext): ExecutionCoordinator {
  const { registry, envBuilder, executor, audit, metrics } = context;
  const generateId = context.generateId ?? (() => nanoid());

  const emit = (
    kind: AuditEventKind,
    requestId: string,
    tool: string,
    detail: string,
    extra: { outcome?: ExecutionResult['outcome'] | ExecutionRejection['error']; securityViolation?: boolean } = {},
  ): void => {
    audit.record({ kind, requestId, tool, detail, timestamp: new Date(), ...extra });
  };

  const reject = (requestId: string, input: ExecutionInput, failure: ValidationFailure): ExecutionRejection => {
    const rejection: ExecutionRejection = {
      status: 'rejected',
      requestId,
      tool: input.tool,
      error: failure.error,
      securityViolation: failure.securityViolation,
      message: failure.message,
    };

    if (failure.securityViolation) {
      emit('security_violation', requestId, input.tool, JSON.stringify(input), {
        outcome: failure.error,
        securityViolation: true,
      });
    }
    emit('validation_failure', requestId, input.tool, failure.message, {
      outcome: failure.error,
      securityViolation: failure.securityViolation,
    });

    metrics.rejected(rejection);
    log.warn({ requestId, tool: input.tool, error: failure.error, securityViolation: failure.securityViolation }, 'Request rejected');
    return rejection;
  };

  const run = async (
    request: ExecutionRequest,
    descriptor: ToolDescriptor,
    workdir: string,
  ): Promise<ExecutionResult> => {
    const limits = envBuilder.buildResourceLimits(request.timeoutSec, descriptor.defaultTimeoutSec);
    const env = envBuilder.buildEnvironment(workdir);
    const binary = descriptor.binaryPath ?? descriptor.binary;

    emit('execution_start', request.requestId, request.tool, JSON.stringify({
      binary,
      args: request.args,
      workdir,
      timeoutMs: limits.timeoutMs,
    }));
    metrics.executionStarted();

    let processOutcome: ProcessOutcome;
    try {
      processOutcome = await executor.run({
        tool: request.tool,
        binary,
        argv: request.args,
        env,
        cwd: workdir,
        limits,
      });
    } catch (error: unknown) {
      log.error({ requestId: request.requestId, tool: request.tool, error: errorMessage(error) }, 'Executor failed unexpectedly');
      processOutcome = {
        state: 'spawn_failed',
        returnCode: null,
        signal: null,
        stdout: '',
        stderr: '',
        truncated: false,
        durationMs: Date.now() - request.createdAt.getTime(),
        pid: undefined,
        spawnError: errorMessage(error),
      };
    }

    const outcome = classifyOutcome(processOutcome);
    const message = outcomeMessage(outcome, processOutcome, limits);
    const result: ExecutionResult = {
      status: 'executed',
      requestId: request.requestId,
      tool: request.tool,
      stdout: processOutcome.stdout,
      stderr: processOutcome.stderr,
      returnCode: processOutcome.returnCode,
      durationMs: processOutcome.durationMs,
      truncated: processOutcome.truncated,
      outcome,
      ...(message !== undefined ? { message } : {}),
    };

    emit('execution_end', request.requestId, request.tool, JSON.stringify({
      returnCode: result.returnCode,
      signal: processOutcome.signal,
      durationMs: result.durationMs,
      truncated: result.truncated,
      ...(processOutcome.spawnError !== undefined ? { spawnError: processOutcome.spawnError } : {}),
    }), { outcome });
    metrics.executionFinished(result);

    log.info(
      { requestId: request.requestId, tool: request.tool, outcome, returnCode: result.returnCode, durationMs: result.durationMs },
      'Execution finished',
    );
    return result;
  };

  return {
    async execute(input: ExecutionInput): Promise<ExecutionResponse> {
      const requestId = generateId();

      const name = validateToolName(input.tool);
      if (!name.ok) {
        return reject(requestId, input, name);
      }

      const descriptor = registry.lookup(name.value);
      if (descriptor === undefined) {
        return reject(requestId, input, {
          ok: false,
          error: 'InvalidToolName',
          securityViolation: true,
          message: `Tool '${name.value}' is not permitted`,
        });
      }

      const args = sanitizeArguments(input.args);
      if (!args.ok) {
        return reject(requestId, input, args);
      }

      const workdir = envBuilder.resolveWorkingDirectory(input.workingDir);
      if (!workdir.ok) {
        return reject(requestId, input, workdir);
      }

      const request: ExecutionRequest = {
        requestId,
        tool: descriptor.name,
        args: args.value,
        createdAt: new Date(),
        ...(input.timeoutSec !== undefined ? { timeoutSec: input.timeoutSec } : {}),
        ...(input.workingDir !== undefined ? { workingDir: input.workingDir } : {}),
      };

      return run(request, descriptor, workdir.value);
    },

    catalog(): CatalogEntry[] {
      return registry.list();
    },

    describe(name: string): ToolDescriptor | undefined {
      return registry.lookup(name);
    },

    health(): HealthData {
      const auditSink = audit.health();
      const registryStatus = registry.status();
      const degraded = !auditSink.healthy || registryStatus.lastReloadError !== null;
      return {
        status: degraded ? 'degraded' : 'ok',
        uptime: Math.floor(process.uptime()),
        version: VERSION,
        auditSink,
        registry: registryStatus,
      };
    },

    metrics(): MetricsSnapshot {
      return metrics.snapshot();
    },
  };
}
