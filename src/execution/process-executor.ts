/**
 * Process Executor
 *
 * Spawns one tool process directly from an argument vector (never through a
 * shell) and supervises it until it is gone: timeout watchdog with
 * SIGTERM-then-SIGKILL escalation, bounded output capture, and outcome
 * classification.
 *
 * Each child runs in its own process group so the watchdog and the final
 * reap reach anything the tool forked.
 *
 * RULE: nothing else in the codebase touches child_process.
 */

import { spawn, type ChildProcessByStdio } from 'node:child_process';
import type { Readable } from 'node:stream';
import type { EffectiveLimits } from '../types/index.js';
import { errorMessage } from '../errors.js';
import { executionLogger } from '../utils/logger.js';
import { createOutputCapture } from './output-capture.js';

const log = executionLogger;

/** How long output may keep draining after the leader exits, in milliseconds */
export const EXIT_DRAIN_MS = 2_000;

/** Lifecycle of one execution. The last four states are terminal. */
export type ExecutionState = 'pending' | 'running' | 'completed' | 'timed_out' | 'killed' | 'spawn_failed';

export type TerminalState = Exclude<ExecutionState, 'pending' | 'running'>;

const TRANSITIONS: Readonly<Record<ExecutionState, readonly ExecutionState[]>> = {
  pending: ['running', 'spawn_failed'],
  running: ['completed', 'timed_out', 'killed', 'spawn_failed'],
  completed: [],
  timed_out: [],
  killed: [],
  spawn_failed: [],
};

/** Everything needed to start one process */
export interface SpawnSpec {
  /** Tool name, for logs only */
  tool: string;
  /** Absolute path or bare executable name resolved through env.PATH */
  binary: string;
  argv: readonly string[];
  env: Record<string, string>;
  cwd: string;
  limits: EffectiveLimits;
}

/** What happened to the process */
export interface ProcessOutcome {
  state: TerminalState;
  returnCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  truncated: boolean;
  durationMs: number;
  pid: number | undefined;
  /** Full OS error for spawn failures; for the audit trail only */
  spawnError?: string;
}

/** Anything able to run a SpawnSpec to completion */
export interface Executor {
  run(spec: SpawnSpec): Promise<ProcessOutcome>;
}

/**
 * Create the child-process backed executor.
 * The returned promise always resolves, once the child has exited and its
 * pipes have closed or EXIT_DRAIN_MS has passed since the exit.
 */
export function createProcessExecutor(): Executor {
  return {
    run(spec: SpawnSpec): Promise<ProcessOutcome> {
      return runProcess(spec);
    },
  };
}

function runProcess(spec: SpawnSpec): Promise<ProcessOutcome> {
  const { timeoutMs, maxOutputBytes, killGraceMs } = spec.limits;
  const capture = createOutputCapture(maxOutputBytes);
  const startedAt = performance.now();

  let state: ExecutionState = 'pending';
  const transition = (next: ExecutionState): void => {
    if (!TRANSITIONS[state].includes(next)) {
      log.error({ tool: spec.tool, from: state, to: next }, 'Illegal execution state transition');
      return;
    }
    state = next;
  };

  return new Promise<ProcessOutcome>((resolve) => {
    let settled = false;
    let watchdogFired = false;
    let watchdogTimer: ReturnType<typeof setTimeout> | undefined;
    let killTimer: ReturnType<typeof setTimeout> | undefined;
    let drainTimer: ReturnType<typeof setTimeout> | undefined;
    let exitStatus: { code: number | null; signal: NodeJS.Signals | null } | undefined;
    let pid: number | undefined;

    const elapsed = (): number => Math.round(performance.now() - startedAt);

    const settle = (outcome: Omit<ProcessOutcome, 'stdout' | 'stderr' | 'truncated' | 'durationMs' | 'pid'>): void => {
      if (settled) return;
      settled = true;
      clearTimeout(watchdogTimer);
      clearTimeout(killTimer);
      clearTimeout(drainTimer);

      // Anything still alive in the group outlived its leader.
      if (pid !== undefined) {
        killProcessGroup(pid, 'SIGKILL');
      }

      resolve({
        ...outcome,
        stdout: capture.text('stdout'),
        stderr: capture.text('stderr'),
        truncated: capture.truncated,
        durationMs: elapsed(),
        pid,
      });
    };

    const failSpawn = (error: unknown): void => {
      transition('spawn_failed');
      const message = error instanceof Error ? formatSpawnError(error) : String(error);
      log.error({ tool: spec.tool, binary: spec.binary, error: message }, 'Spawn failed');
      settle({ state: 'spawn_failed', returnCode: null, signal: null, spawnError: message });
    };

    let child: ChildProcessByStdio<null, Readable, Readable>;
    try {
      child = spawn(spec.binary, spec.argv, {
        cwd: spec.cwd,
        env: spec.env,
        shell: false,
        detached: true,
        windowsHide: true,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (spawnError: unknown) {
      failSpawn(spawnError);
      return;
    }

    pid = child.pid;

    child.stdout.on('data', (chunk: Buffer) => capture.append('stdout', chunk));
    child.stderr.on('data', (chunk: Buffer) => capture.append('stderr', chunk));
    child.stdout.on('error', (streamError: Error) => {
      log.warn({ tool: spec.tool, error: streamError.message }, 'stdout stream error');
    });
    child.stderr.on('error', (streamError: Error) => {
      log.warn({ tool: spec.tool, error: streamError.message }, 'stderr stream error');
    });

    child.on('error', (error: Error) => {
      if (state === 'pending' || child.pid === undefined) {
        failSpawn(error);
        return;
      }
      // Post-spawn errors come from signalling; the close event still follows.
      log.warn({ tool: spec.tool, pid, error: error.message }, 'Child process error');
    });

    child.on('spawn', () => {
      transition('running');
      log.debug({ tool: spec.tool, pid: child.pid, timeoutMs }, 'Process started');
    });

    const finish = (code: number | null, signal: NodeJS.Signals | null): void => {
      if (watchdogFired) {
        transition('timed_out');
        settle({ state: 'timed_out', returnCode: code, signal });
        return;
      }

      if (signal !== null) {
        transition('killed');
        log.warn({ tool: spec.tool, pid, signal }, 'Process killed by signal');
        settle({ state: 'killed', returnCode: null, signal });
        return;
      }

      transition('completed');
      settle({ state: 'completed', returnCode: code, signal: null });
    };

    // The leader's status is final once it exits; background children may
    // still hold the pipes, so the group is killed and the pipes drained.
    child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled || state === 'pending') return;
      exitStatus = { code, signal };
      clearTimeout(watchdogTimer);
      clearTimeout(killTimer);
      if (pid !== undefined) {
        killProcessGroup(pid, 'SIGKILL');
      }

      drainTimer = setTimeout(() => {
        if (settled) return;
        log.warn({ tool: spec.tool, pid, drainMs: EXIT_DRAIN_MS }, 'Output pipes still open after exit, closing them');
        child.stdout.destroy();
        child.stderr.destroy();
        finish(code, signal);
      }, EXIT_DRAIN_MS);
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled || state === 'pending') {
        // spawn failed; the error handler settles
        return;
      }
      const status = exitStatus ?? { code, signal };
      finish(status.code, status.signal);
    });

    watchdogTimer = setTimeout(() => {
      if (settled || pid === undefined) return;
      watchdogFired = true;
      log.warn({ tool: spec.tool, pid, timeoutMs }, 'Process timed out, sending SIGTERM');
      killProcessGroup(pid, 'SIGTERM');

      killTimer = setTimeout(() => {
        if (settled || pid === undefined) return;
        log.warn({ tool: spec.tool, pid, killGraceMs }, 'Grace period expired, sending SIGKILL');
        killProcessGroup(pid, 'SIGKILL');
      }, killGraceMs);
    }, timeoutMs);
  });
}

/** Signal every process in the group led by pid. */
function killProcessGroup(pid: number, signal: NodeJS.Signals): void {
  try {
    process.kill(-pid, signal);
  } catch (error: unknown) {
    if (isNoSuchProcess(error)) {
      return;
    }
    log.warn({ pid, signal, error: errorMessage(error) }, 'Failed to signal process group');
    try {
      process.kill(pid, signal);
    } catch (fallbackError: unknown) {
      if (!isNoSuchProcess(fallbackError)) {
        log.warn({ pid, signal, error: errorMessage(fallbackError) }, 'Failed to signal process');
      }
    }
  }
}

function isNoSuchProcess(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ESRCH';
}

function formatSpawnError(error: Error): string {
  const parts = [error.message];
  if ('code' in error && typeof error.code === 'string') parts.push(`code=${error.code}`);
  if ('path' in error && typeof error.path === 'string') parts.push(`path=${error.path}`);
  return parts.join(' ');
}
