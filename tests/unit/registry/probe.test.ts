import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { chmodSync, mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { createProcessExecutor } from '../../../src/execution/process-executor.js';
import { createToolProber, resolveExecutable } from '../../../src/registry/probe.js';
import type { ToolDescriptor } from '../../../src/types/index.js';
import { completedOutcome, createFakeExecutor } from '../../mocks/engine.js';
import { createTestSandbox, type TestSandbox } from '../../mocks/sandbox.js';

function descriptor(name: string, binary: string = name): ToolDescriptor {
  return {
    name,
    binary,
    binaryPath: null,
    category: 'custom',
    description: 'test tool',
    defaultTimeoutSec: null,
    available: false,
    version: null,
    lastProbedAt: null,
  };
}

describe('tool probing', () => {
  let sandbox: TestSandbox;
  let binDir: string;

  beforeAll(() => {
    sandbox = createTestSandbox();
    binDir = path.join(sandbox.root, 'bin');
    mkdirSync(binDir);
    mkdirSync(path.join(binDir, 'a-directory'));
    writeFileSync(path.join(binDir, 'runnable'), '#!/bin/sh\necho "runnable 2.1"\n');
    chmodSync(path.join(binDir, 'runnable'), 0o755);
    writeFileSync(path.join(binDir, 'not-executable'), 'data');
    chmodSync(path.join(binDir, 'not-executable'), 0o644);
  });

  afterAll(() => {
    sandbox.cleanup();
  });

  it('finds an executable file on the search path', async () => {
    expect(await resolveExecutable('runnable', `/nonexistent:${binDir}`)).toBe(path.join(binDir, 'runnable'));
  });

  it('skips directories and files without the execute bit', async () => {
    expect(await resolveExecutable('a-directory', binDir)).toBeNull();
    // X_OK fails even for root when no execute bit is set
    expect(await resolveExecutable('not-executable', binDir)).toBeNull();
  });

  it('ignores relative search path entries', async () => {
    expect(await resolveExecutable('runnable', 'bin')).toBeNull();
  });

  it('reads the version from the first line of output', async () => {
    const prober = createToolProber({
      executor: createProcessExecutor(),
      searchPath: binDir,
      workdir: sandbox.root,
      timeoutMs: 5_000,
    });

    const probed = await prober.probe(descriptor('runnable'));

    expect(probed).toMatchObject({
      available: true,
      binaryPath: path.join(binDir, 'runnable'),
      version: 'runnable 2.1',
    });
    expect(probed.lastProbedAt).toBeInstanceOf(Date);
  });

  it('marks a missing tool unavailable', async () => {
    const executor = createFakeExecutor();
    const prober = createToolProber({ executor, searchPath: binDir, workdir: sandbox.root, timeoutMs: 1_000 });

    const probed = await prober.probe(descriptor('masscan'));

    expect(probed).toMatchObject({ available: false, binaryPath: null, version: null });
    expect(executor.run).not.toHaveBeenCalled();
  });

  it('keeps a tool available without a version when --version fails', async () => {
    const executor = createFakeExecutor(completedOutcome({ returnCode: 1, stdout: 'usage: runnable' }));
    const prober = createToolProber({ executor, searchPath: binDir, workdir: sandbox.root, timeoutMs: 1_000 });

    const probed = await prober.probe(descriptor('runnable'));

    expect(probed).toMatchObject({ available: true, version: null });
    expect(executor.run.mock.calls[0]?.[0]).toMatchObject({
      argv: ['--version'],
      limits: { timeoutMs: 1_000, maxOutputBytes: 4096, killGraceMs: 500 },
    });
  });

  it('falls back to stderr for the version line', async () => {
    const executor = createFakeExecutor(completedOutcome({ stdout: '', stderr: '\n  runnable v9 \nmore' }));
    const prober = createToolProber({ executor, searchPath: binDir, workdir: sandbox.root, timeoutMs: 1_000 });

    expect((await prober.probe(descriptor('runnable'))).version).toBe('runnable v9');
  });

  it('looks up the binary name rather than the tool name', async () => {
    const executor = createFakeExecutor(completedOutcome({ stdout: 'v1\n' }));
    const prober = createToolProber({ executor, searchPath: binDir, workdir: sandbox.root, timeoutMs: 1_000 });

    const probed = await prober.probe(descriptor('friendly-name', 'runnable'));
    expect(probed.binaryPath).toBe(path.join(binDir, 'runnable'));
  });
});
