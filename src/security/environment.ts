/**
 * Sandbox Environment Builder
 *
 * Derives the minimal environment, the working directory and the effective
 * limits for one execution. The parent environment is never inherited
 * wholesale: only allow-listed variables are copied, and loader or proxy
 * variables are refused even when allow-listed.
 */

import { statSync } from 'node:fs';
import type { EffectiveLimits, ResourceLimits } from '../types/index.js';
import { securityLogger } from '../utils/logger.js';
import { validateWorkingDirectory, type ValidationOutcome } from './validator.js';

/** Variables copied from the parent environment when present */
export const ENV_ALLOWLIST: readonly string[] = ['LANG', 'LC_ALL', 'TERM', 'TZ', 'USER'];

/** Never copied, whatever the allow-list says */
const FORBIDDEN_ENV_PATTERNS: readonly RegExp[] = [
  /^LD_/i,
  /^DYLD_/i,
  /_proxy$/i,
  /^proxy_/i,
];

/** Lower bound for any effective timeout, in seconds */
export const MIN_TIMEOUT_SEC = 1;

/** Node clamps longer timer delays to 1ms */
const MAX_TIMEOUT_MS = 2_147_483_647;

export interface SandboxEnvironmentOptions {
  limits: ResourceLimits;
  /** PATH handed to tools */
  searchPath: string;
  /** Extra parent variables to copy, on top of ENV_ALLOWLIST */
  envAllowlist?: readonly string[];
  /** Parent environment; defaults to process.env */
  parentEnv?: NodeJS.ProcessEnv;
}

export interface SandboxEnvironmentBuilder {
  /** Minimal environment for a tool running in `workdir`. */
  buildEnvironment(workdir: string): Record<string, string>;
  /** Sandbox root when nothing is requested; otherwise the validated, existing directory. */
  resolveWorkingDirectory(requested: string | undefined): ValidationOutcome<string>;
  /** Effective limits for one request. */
  buildResourceLimits(requestTimeoutSec: number | undefined, toolDefaultSec: number | null): EffectiveLimits;
}

/**
 * Compute the effective timeout in seconds:
 * min(requested or default, globalMax), never below MIN_TIMEOUT_SEC.
 */
export function computeEffectiveTimeout(
  requestTimeoutSec: number | undefined,
  globalMaxSec: number,
  defaultTimeoutSec: number,
): number {
  const requested = requestTimeoutSec !== undefined && Number.isFinite(requestTimeoutSec)
    ? requestTimeoutSec
    : defaultTimeoutSec;
  return Math.max(Math.min(requested, globalMaxSec), MIN_TIMEOUT_SEC);
}

export function isForbiddenEnvName(name: string): boolean {
  return FORBIDDEN_ENV_PATTERNS.some((pattern) => pattern.test(name));
}

/**
 * Create a builder bound to the process-wide limits snapshot.
 */
export function createSandboxEnvironmentBuilder(options: SandboxEnvironmentOptions): SandboxEnvironmentBuilder {
  const { limits, searchPath } = options;
  const parentEnv = options.parentEnv ?? process.env;
  const allowlist = [...new Set([...ENV_ALLOWLIST, ...(options.envAllowlist ?? [])])]
    .filter((name) => !isForbiddenEnvName(name));

  return {
    buildEnvironment(workdir: string): Record<string, string> {
      const env: Record<string, string> = {};

      for (const name of allowlist) {
        const value = parentEnv[name];
        if (value !== undefined) {
          env[name] = value;
        }
      }

      env['PATH'] = searchPath;
      env['HOME'] = limits.sandboxRoot;
      env['PWD'] = workdir;
      if (env['LANG'] === undefined) {
        env['LANG'] = 'C.UTF-8';
      }

      return env;
    },

    resolveWorkingDirectory(requested: string | undefined): ValidationOutcome<string> {
      const validated = requested === undefined
        ? validateWorkingDirectory(limits.sandboxRoot, limits.sandboxRoot)
        : validateWorkingDirectory(requested, limits.sandboxRoot);

      if (!validated.ok) {
        return validated;
      }

      if (!isDirectory(validated.value)) {
        securityLogger.debug({ workdir: validated.value }, 'Working directory does not exist');
        return {
          ok: false,
          error: 'WorkingDirectoryNotFound',
          securityViolation: false,
          message: 'Working directory does not exist inside the sandbox',
        };
      }

      return validated;
    },

    buildResourceLimits(requestTimeoutSec: number | undefined, toolDefaultSec: number | null): EffectiveLimits {
      const defaultSec = Math.min(toolDefaultSec ?? limits.defaultTimeoutSec, limits.maxTimeoutSec);
      const timeoutSec = computeEffectiveTimeout(requestTimeoutSec, limits.maxTimeoutSec, defaultSec);
      return {
        timeoutMs: Math.min(timeoutSec * 1000, MAX_TIMEOUT_MS),
        maxOutputBytes: limits.maxOutputBytes,
        killGraceMs: limits.killGraceMs,
      };
    },
  };
}

function isDirectory(candidate: string): boolean {
  try {
    return statSync(candidate).isDirectory();
  } catch {
    return false;
  }
}
