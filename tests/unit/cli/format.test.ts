import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { exitCodeFor, formatCatalog } from '../../../src/cli/format.js';
import type { ExecutionRejection, ExecutionResult } from '../../../src/types/index.js';

function result(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return {
    status: 'executed',
    requestId: 'req-1',
    tool: 'nmap',
    stdout: '',
    stderr: '',
    returnCode: 0,
    durationMs: 12,
    truncated: false,
    outcome: 'success',
    ...overrides,
  };
}

describe('formatCatalog', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('renders an aligned table with a summary line', () => {
    const output = formatCatalog([
      { name: 'nmap', category: 'network_scanning', available: true, version: 'Nmap version 7.94' },
      { name: 'hydra', category: 'password', available: false, version: null },
    ]);

    expect(output.split('\n')).toEqual([
      'TOOL   CATEGORY          STATUS     VERSION',
      'nmap   network_scanning  available  Nmap version 7.94',
      'hydra  password          missing    -',
      '',
      '1/2 tools available',
    ]);
  });

  it('renders an empty catalog', () => {
    expect(formatCatalog([]).split('\n')).toEqual([
      'TOOL  CATEGORY  STATUS     VERSION',
      '',
      '0/0 tools available',
    ]);
  });
});

describe('exitCodeFor', () => {
  it('returns 2 for rejected requests', () => {
    const rejection: ExecutionRejection = {
      status: 'rejected',
      requestId: 'req-1',
      tool: 'nmap',
      error: 'DisallowedArgument',
      securityViolation: true,
      message: 'Argument contains forbidden character',
    };
    expect(exitCodeFor(rejection)).toBe(2);
  });

  it('maps outcomes to shell exit codes', () => {
    expect(exitCodeFor(result())).toBe(0);
    expect(exitCodeFor(result({ outcome: 'tool_error', returnCode: 3 }))).toBe(3);
    expect(exitCodeFor(result({ outcome: 'tool_error', returnCode: null }))).toBe(1);
    expect(exitCodeFor(result({ outcome: 'timed_out', returnCode: null }))).toBe(124);
    expect(exitCodeFor(result({ outcome: 'killed', returnCode: null }))).toBe(137);
    expect(exitCodeFor(result({ outcome: 'spawn_failed', returnCode: null }))).toBe(127);
  });
});
