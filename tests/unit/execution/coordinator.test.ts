import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import {
  SPAWN_FAILED_MESSAGE,
  classifyOutcome,
  createExecutionCoordinator,
  type ExecutionCoordinator,
} from '../../../src/execution/coordinator.js';
import { createExecutionMetrics } from '../../../src/execution/metrics.js';
import { createToolRegistry } from '../../../src/registry/tool-registry.js';
import { createSandboxEnvironmentBuilder } from '../../../src/security/environment.js';
import { completedOutcome, createFakeExecutor, createRecordingAuditLogger, type FakeExecutor, type RecordingAuditLogger } from '../../mocks/engine.js';
import { createTestSandbox, testLimits, TEST_SEARCH_PATH, TEST_TOOLS, type TestSandbox } from '../../mocks/sandbox.js';

describe('classifyOutcome', () => {
  it('maps process states to caller outcomes', () => {
    expect(classifyOutcome(completedOutcome({ returnCode: 0 }))).toBe('success');
    expect(classifyOutcome(completedOutcome({ returnCode: 2 }))).toBe('tool_error');
    expect(classifyOutcome(completedOutcome({ state: 'timed_out', returnCode: null }))).toBe('timed_out');
    expect(classifyOutcome(completedOutcome({ state: 'killed', returnCode: null }))).toBe('killed');
    expect(classifyOutcome(completedOutcome({ state: 'spawn_failed', returnCode: null }))).toBe('spawn_failed');
  });
});

describe('createExecutionCoordinator', () => {
  let sandbox: TestSandbox;
  let executor: FakeExecutor;
  let audit: RecordingAuditLogger;
  let coordinator: ExecutionCoordinator;

  const build = (fake: FakeExecutor): ExecutionCoordinator => {
    let counter = 0;
    return createExecutionCoordinator({
      registry: createToolRegistry({ extraTools: TEST_TOOLS }),
      envBuilder: createSandboxEnvironmentBuilder({
        limits: testLimits(sandbox.root, { maxTimeoutSec: 120, defaultTimeoutSec: 60 }),
        searchPath: TEST_SEARCH_PATH,
        parentEnv: {},
      }),
      executor: fake,
      audit,
      metrics: createExecutionMetrics(),
      generateId: () => `req-${++counter}`,
    });
  };

  beforeAll(() => {
    sandbox = createTestSandbox();
    mkdirSync(path.join(sandbox.root, 'scans'));
  });

  afterAll(() => {
    sandbox.cleanup();
  });

  beforeEach(() => {
    executor = createFakeExecutor(completedOutcome({ stdout: 'ok\n' }));
    audit = createRecordingAuditLogger();
    coordinator = build(executor);
  });

  describe('rejections', () => {
    it('rejects a tool outside the registry without spawning', async () => {
      const response = await coordinator.execute({ tool: 'bash', args: ['-c', 'id'] });

      expect(response).toEqual({
        status: 'rejected',
        requestId: 'req-1',
        tool: 'bash',
        error: 'InvalidToolName',
        securityViolation: true,
        message: "Tool 'bash' is not permitted",
      });
      expect(executor.run).not.toHaveBeenCalled();
    });

    it('matches tool names exactly', async () => {
      for (const tool of ['NMAP', 'nmap2', 'nma', 'echo ']) {
        const response = await coordinator.execute({ tool });
        expect(response.status).toBe('rejected');
      }
      expect(executor.run).not.toHaveBeenCalled();
    });

    it('emits a security_violation with the full input, then one validation_failure', async () => {
      const input = { tool: 'echo', args: ['hi;', 'rm -rf /'] };
      await coordinator.execute(input);

      expect(audit.events.map((event) => event.kind)).toEqual(['security_violation', 'validation_failure']);
      expect(audit.events[0]?.detail).toBe(JSON.stringify(input));
      expect(audit.events[1]).toMatchObject({
        requestId: 'req-1',
        tool: 'echo',
        outcome: 'DisallowedArgument',
        securityViolation: true,
      });
      expect(executor.run).not.toHaveBeenCalled();
    });

    it('emits only validation_failure for a non-security rejection', async () => {
      const response = await coordinator.execute({ tool: 'echo', workingDir: '../../etc' });

      expect(response).toMatchObject({ status: 'rejected', error: 'PathEscapesSandbox', securityViolation: false });
      expect(audit.events.map((event) => event.kind)).toEqual(['validation_failure']);
    });

    it('rejects a working directory that does not exist', async () => {
      const response = await coordinator.execute({ tool: 'echo', workingDir: 'missing' });
      expect(response).toMatchObject({ status: 'rejected', error: 'WorkingDirectoryNotFound' });
    });

    it('counts rejections by kind', async () => {
      await coordinator.execute({ tool: 'bash' });
      await coordinator.execute({ tool: 'echo', args: ['`id`'] });

      const metrics = coordinator.metrics();
      expect(metrics.totalRejections).toBe(2);
      expect(metrics.rejectionsByKind.InvalidToolName).toBe(1);
      expect(metrics.rejectionsByKind.DisallowedArgument).toBe(1);
      expect(metrics.totalExecutions).toBe(0);
    });
  });

  describe('executions', () => {
    it('hands the executor a sandboxed spawn spec', async () => {
      await coordinator.execute({ tool: 'echo', args: ['-n', 'hi'], workingDir: 'scans', timeoutSec: 5 });

      expect(executor.run).toHaveBeenCalledTimes(1);
      const spec = executor.run.mock.calls[0]?.[0];
      expect(spec).toMatchObject({
        tool: 'echo',
        binary: 'echo',
        argv: ['-n', 'hi'],
        cwd: path.join(sandbox.root, 'scans'),
        limits: { timeoutMs: 5_000, maxOutputBytes: 1_048_576, killGraceMs: 500 },
      });
      expect(spec?.env).toMatchObject({ PATH: TEST_SEARCH_PATH, HOME: sandbox.root, PWD: path.join(sandbox.root, 'scans') });
    });

    it('caps the timeout at the global maximum', async () => {
      await coordinator.execute({ tool: 'echo', timeoutSec: 100_000 });
      expect(executor.run.mock.calls[0]?.[0].limits.timeoutMs).toBe(120_000);
    });

    it('uses the per-tool default timeout when none is requested', async () => {
      await coordinator.execute({ tool: 'nmap' });
      // nmap defaults to 300s, capped by the 120s maximum
      expect(executor.run.mock.calls[0]?.[0].limits.timeoutMs).toBe(120_000);
    });

    it('returns a success result and emits start then end', async () => {
      const response = await coordinator.execute({ tool: 'echo', args: ['ok'] });

      expect(response).toEqual({
        status: 'executed',
        requestId: 'req-1',
        tool: 'echo',
        stdout: 'ok\n',
        stderr: '',
        returnCode: 0,
        durationMs: 5,
        truncated: false,
        outcome: 'success',
      });
      expect(audit.events.map((event) => event.kind)).toEqual(['execution_start', 'execution_end']);
      expect(audit.events[1]?.outcome).toBe('success');
    });

    it('keeps success for a zero exit even when output was truncated', async () => {
      coordinator = build(createFakeExecutor(completedOutcome({ truncated: true })));
      const response = await coordinator.execute({ tool: 'echo' });
      expect(response).toMatchObject({ status: 'executed', outcome: 'success', truncated: true });
    });

    it('describes tool errors with the exit code', async () => {
      coordinator = build(createFakeExecutor(completedOutcome({ returnCode: 4 })));
      const response = await coordinator.execute({ tool: 'echo' });
      expect(response).toMatchObject({ outcome: 'tool_error', returnCode: 4, message: 'Tool exited with code 4' });
    });

    it('describes timeouts with the effective limit', async () => {
      coordinator = build(createFakeExecutor(completedOutcome({ state: 'timed_out', returnCode: null, signal: 'SIGTERM' })));
      const response = await coordinator.execute({ tool: 'echo', timeoutSec: 7 });
      expect(response).toMatchObject({ outcome: 'timed_out', message: 'Execution timed out after 7 seconds' });
    });

    it('hides the OS error from callers but keeps it in the audit trail', async () => {
      coordinator = build(createFakeExecutor(completedOutcome({
        state: 'spawn_failed',
        returnCode: null,
        spawnError: 'spawn /usr/bin/echo EACCES code=EACCES',
      })));

      const response = await coordinator.execute({ tool: 'echo' });

      expect(response).toMatchObject({ outcome: 'spawn_failed', returnCode: null, message: SPAWN_FAILED_MESSAGE });
      const end = audit.events.find((event) => event.kind === 'execution_end');
      expect(end?.detail).toContain('EACCES');
    });

    it('turns an executor exception into a spawn_failed result', async () => {
      const failing = createFakeExecutor();
      failing.run.mockRejectedValue(new Error('executor exploded'));
      coordinator = build(failing);

      const response = await coordinator.execute({ tool: 'echo' });

      expect(response).toMatchObject({ status: 'executed', outcome: 'spawn_failed', message: SPAWN_FAILED_MESSAGE });
      expect(audit.events.map((event) => event.kind)).toEqual(['execution_start', 'execution_end']);
    });

    it('tracks executions, outcomes and the last error', async () => {
      await coordinator.execute({ tool: 'echo' });
      coordinator = build(createFakeExecutor(completedOutcome({ returnCode: 1, durationMs: 20 })));
      await coordinator.execute({ tool: 'sh' });

      const metrics = coordinator.metrics();
      expect(metrics.totalExecutions).toBe(1);
      expect(metrics.perOutcome.tool_error).toBe(1);
      expect(metrics.perTool).toEqual({ sh: 1 });
      expect(metrics.lastError).toMatchObject({ requestId: 'req-1', tool: 'sh', message: 'Tool exited with code 1' });
      expect(metrics.inFlight).toBe(0);
    });
  });

  describe('catalog and health', () => {
    it('lists built-ins and extensions sorted by name', () => {
      const names = coordinator.catalog().map((entry) => entry.name);
      expect(names).toContain('nmap');
      expect(names).toContain('echo');
      expect(names).toEqual([...names].sort((a, b) => a.localeCompare(b)));
    });

    it('describes a registered tool', () => {
      expect(coordinator.describe('metasploit-framework')).toMatchObject({ binary: 'msfconsole', category: 'exploitation' });
      expect(coordinator.describe('bash')).toBeUndefined();
    });

    it('reports ok while the audit sink is healthy', () => {
      expect(coordinator.health()).toMatchObject({ status: 'ok', version: '0.1.0', registry: { lastReloadError: null } });
    });
  });
});
