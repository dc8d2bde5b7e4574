/**
 * Temporary sandbox roots for tests.
 * Paths are canonical (tmpdir may sit behind a symlink, e.g. on macOS).
 */

import { mkdtempSync, readFileSync, realpathSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_SANDBOX_PATH } from '../../src/config/schema.js';
import type { ResourceLimits } from '../../src/types/index.js';

export interface TestSandbox {
  root: string;
  cleanup(): void;
}

export function createTestSandbox(prefix: string = 'toolwarden-test-'): TestSandbox {
  const root = realpathSync(mkdtempSync(path.join(os.tmpdir(), prefix)));
  return {
    root,
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

export function testLimits(sandboxRoot: string, overrides: Partial<ResourceLimits> = {}): ResourceLimits {
  return {
    maxTimeoutSec: 300,
    defaultTimeoutSec: 60,
    maxOutputBytes: 1_048_576,
    killGraceMs: 500,
    sandboxRoot,
    ...overrides,
  };
}

export const TEST_SEARCH_PATH = DEFAULT_SANDBOX_PATH;

/** POSIX binaries the tests register as operator extensions */
export const TEST_TOOLS: readonly string[] = ['echo', 'sleep', 'seq', 'sh', 'pwd', 'env', 'false', 'printf'];

/**
 * True while `pid` exists and is not a zombie.
 * Orphans reparented to a non-reaping PID 1 linger as zombies in containers.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
  } catch {
    return false;
  }
  if (process.platform !== 'linux') {
    return true;
  }
  try {
    const stat = readFileSync(`/proc/${pid}/stat`, 'utf8');
    return stat.slice(stat.lastIndexOf(')') + 2, stat.lastIndexOf(')') + 3) !== 'Z';
  } catch {
    return false;
  }
}
