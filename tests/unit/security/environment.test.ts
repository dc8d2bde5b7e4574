import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import {
  MIN_TIMEOUT_SEC,
  computeEffectiveTimeout,
  createSandboxEnvironmentBuilder,
  isForbiddenEnvName,
} from '../../../src/security/environment.js';
import { createTestSandbox, testLimits, type TestSandbox } from '../../mocks/sandbox.js';

const SEARCH_PATH = '/usr/bin:/bin';

describe('computeEffectiveTimeout', () => {
  it('uses the requested value when under the maximum', () => {
    expect(computeEffectiveTimeout(30, 300, 60)).toBe(30);
  });

  it('caps at the global maximum', () => {
    expect(computeEffectiveTimeout(10_000, 300, 60)).toBe(300);
  });

  it('falls back to the default when nothing is requested', () => {
    expect(computeEffectiveTimeout(undefined, 300, 60)).toBe(60);
  });

  it('never goes below the minimum', () => {
    expect(computeEffectiveTimeout(0, 300, 60)).toBe(MIN_TIMEOUT_SEC);
    expect(computeEffectiveTimeout(-5, 300, 60)).toBe(MIN_TIMEOUT_SEC);
  });

  it('ignores non-finite requests', () => {
    expect(computeEffectiveTimeout(Number.NaN, 300, 60)).toBe(60);
  });
});

describe('isForbiddenEnvName', () => {
  it.each(['LD_PRELOAD', 'LD_LIBRARY_PATH', 'DYLD_INSERT_LIBRARIES', 'http_proxy', 'HTTPS_PROXY', 'no_proxy'])(
    'refuses %s',
    (name) => {
      expect(isForbiddenEnvName(name)).toBe(true);
    },
  );

  it.each(['LANG', 'TZ', 'USER'])('allows %s', (name) => {
    expect(isForbiddenEnvName(name)).toBe(false);
  });
});

describe('createSandboxEnvironmentBuilder', () => {
  let sandbox: TestSandbox;

  beforeAll(() => {
    sandbox = createTestSandbox();
    mkdirSync(path.join(sandbox.root, 'work'));
    writeFileSync(path.join(sandbox.root, 'notes.txt'), 'x');
  });

  afterAll(() => {
    sandbox.cleanup();
  });

  describe('buildEnvironment', () => {
    it('copies only allow-listed variables and pins PATH, HOME and PWD', () => {
      const builder = createSandboxEnvironmentBuilder({
        limits: testLimits(sandbox.root),
        searchPath: SEARCH_PATH,
        parentEnv: {
          PATH: '/opt/evil/bin',
          HOME: '/root',
          LANG: 'en_US.UTF-8',
          TZ: 'UTC',
          AWS_SECRET_ACCESS_KEY: 'test-secret',
          LD_PRELOAD: '/tmp/evil.so',
          http_proxy: 'http://proxy.test:3128',
        },
      });

      expect(builder.buildEnvironment(path.join(sandbox.root, 'work'))).toEqual({
        LANG: 'en_US.UTF-8',
        TZ: 'UTC',
        PATH: SEARCH_PATH,
        HOME: sandbox.root,
        PWD: path.join(sandbox.root, 'work'),
      });
    });

    it('defaults LANG when the parent has none', () => {
      const builder = createSandboxEnvironmentBuilder({
        limits: testLimits(sandbox.root),
        searchPath: SEARCH_PATH,
        parentEnv: {},
      });
      expect(builder.buildEnvironment(sandbox.root)['LANG']).toBe('C.UTF-8');
    });

    it('honors extra allow-list entries but never loader or proxy variables', () => {
      const builder = createSandboxEnvironmentBuilder({
        limits: testLimits(sandbox.root),
        searchPath: SEARCH_PATH,
        envAllowlist: ['NMAPDIR', 'LD_PRELOAD', 'HTTPS_PROXY'],
        parentEnv: { NMAPDIR: '/usr/share/nmap', LD_PRELOAD: '/tmp/evil.so', HTTPS_PROXY: 'http://proxy.test' },
      });

      const env = builder.buildEnvironment(sandbox.root);
      expect(env['NMAPDIR']).toBe('/usr/share/nmap');
      expect(env).not.toHaveProperty('LD_PRELOAD');
      expect(env).not.toHaveProperty('HTTPS_PROXY');
    });
  });

  describe('resolveWorkingDirectory', () => {
    const builder = (): ReturnType<typeof createSandboxEnvironmentBuilder> =>
      createSandboxEnvironmentBuilder({ limits: testLimits(sandbox.root), searchPath: SEARCH_PATH, parentEnv: {} });

    it('uses the sandbox root when nothing is requested', () => {
      expect(builder().resolveWorkingDirectory(undefined)).toEqual({ ok: true, value: sandbox.root });
    });

    it('accepts an existing directory inside the root', () => {
      expect(builder().resolveWorkingDirectory('work')).toEqual({ ok: true, value: path.join(sandbox.root, 'work') });
    });

    it('reports a missing directory without creating it', () => {
      expect(builder().resolveWorkingDirectory('missing')).toEqual({
        ok: false,
        error: 'WorkingDirectoryNotFound',
        securityViolation: false,
        message: 'Working directory does not exist inside the sandbox',
      });
    });

    it('reports a regular file as not found', () => {
      expect(builder().resolveWorkingDirectory('notes.txt')).toMatchObject({ ok: false, error: 'WorkingDirectoryNotFound' });
    });

    it('passes escapes through as PathEscapesSandbox', () => {
      expect(builder().resolveWorkingDirectory('../..')).toMatchObject({ ok: false, error: 'PathEscapesSandbox' });
    });
  });

  describe('buildResourceLimits', () => {
    const builder = createSandboxEnvironmentBuilder({
      limits: testLimits('/srv/sandbox', { maxTimeoutSec: 120, defaultTimeoutSec: 60, maxOutputBytes: 2048, killGraceMs: 250 }),
      searchPath: SEARCH_PATH,
      parentEnv: {},
    });

    it('uses the global default when neither request nor tool set one', () => {
      expect(builder.buildResourceLimits(undefined, null)).toEqual({ timeoutMs: 60_000, maxOutputBytes: 2048, killGraceMs: 250 });
    });

    it('prefers the tool default over the global default', () => {
      expect(builder.buildResourceLimits(undefined, 30).timeoutMs).toBe(30_000);
    });

    it('caps a tool default above the global maximum', () => {
      expect(builder.buildResourceLimits(undefined, 300).timeoutMs).toBe(120_000);
    });

    it('caps the requested timeout at the global maximum', () => {
      expect(builder.buildResourceLimits(9_999, 30).timeoutMs).toBe(120_000);
    });

    it('keeps the timer delay within the range Node timers accept', () => {
      const unbounded = createSandboxEnvironmentBuilder({
        limits: testLimits('/srv/sandbox', { maxTimeoutSec: 3_000_000, defaultTimeoutSec: 3_000_000 }),
        searchPath: SEARCH_PATH,
        parentEnv: {},
      });

      expect(unbounded.buildResourceLimits(undefined, null).timeoutMs).toBe(2_147_483_647);
      expect(unbounded.buildResourceLimits(2_500_000, null).timeoutMs).toBe(2_147_483_647);
    });
  });
});
