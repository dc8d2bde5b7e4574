/**
 * Configuration loader for toolwarden.
 * Reads config from ~/.toolwarden/config.json, applies env var overrides,
 * validates with Zod and derives the frozen ResourceLimits snapshot.
 *
 * Priority: env vars > config.json > Zod defaults
 */

import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ConfigError } from '../errors.js';
import type { ResourceLimits } from '../types/index.js';
import { createModuleLogger } from '../utils/logger.js';
import { ConfigSchema, type Config } from './schema.js';

const log = createModuleLogger('config');

/**
 * Returns the base directory for toolwarden configuration and state files.
 * Checks TOOLWARDEN_HOME env var first, then defaults to ~/.toolwarden.
 */
export function homeDir(): string {
  return process.env.TOOLWARDEN_HOME ?? path.join(os.homedir(), '.toolwarden');
}

/** Returns the full path to the config.json file. */
export function configFilePath(): string {
  return path.join(homeDir(), 'config.json');
}

/** Returns the full path to the audit database. */
export function auditDbPath(): string {
  return path.join(homeDir(), 'audit.db');
}

/**
 * Reads the raw config file from disk.
 * Returns an empty object if the file does not exist.
 */
async function readConfigFile(): Promise<Record<string, unknown>> {
  try {
    const raw = await readFile(configFilePath(), 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) {
      throw new ConfigError('Config file must contain a JSON object');
    }
    return parsed;
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      throw error;
    }
    if (isErrnoException(error) && error.code === 'ENOENT') {
      log.info('No config file found, using defaults');
      return {};
    }
    if (error instanceof SyntaxError) {
      throw new ConfigError(`Config file contains invalid JSON: ${error.message}`);
    }
    throw new ConfigError(`Failed to read config file: ${String(error)}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Applies environment variable overrides to the raw config object.
 * Supported env vars:
 *   TOOLWARDEN_MAX_TIMEOUT      -> limits.maxTimeoutSec
 *   TOOLWARDEN_DEFAULT_TIMEOUT  -> limits.defaultTimeoutSec
 *   TOOLWARDEN_MAX_OUTPUT_SIZE  -> limits.maxOutputBytes
 *   TOOLWARDEN_SANDBOX_ROOT     -> sandbox.root
 *   TOOLWARDEN_EXTRA_TOOLS      -> tools.extra (comma separated, appended)
 *   TOOLWARDEN_HOST             -> gateway.host
 *   TOOLWARDEN_PORT             -> gateway.port
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const merged = structuredClone(config);

  const ensureNested = (obj: Record<string, unknown>, key: string): Record<string, unknown> => {
    const current = obj[key];
    if (isRecord(current)) {
      return current;
    }
    const created: Record<string, unknown> = {};
    obj[key] = created;
    return created;
  };

  const numericOverrides: Array<[string, string, string]> = [
    ['TOOLWARDEN_MAX_TIMEOUT', 'limits', 'maxTimeoutSec'],
    ['TOOLWARDEN_DEFAULT_TIMEOUT', 'limits', 'defaultTimeoutSec'],
    ['TOOLWARDEN_MAX_OUTPUT_SIZE', 'limits', 'maxOutputBytes'],
    ['TOOLWARDEN_PORT', 'gateway', 'port'],
  ];

  for (const [envVar, section, key] of numericOverrides) {
    const value = env[envVar];
    if (value === undefined) continue;
    const parsed = Number(value);
    if (Number.isNaN(parsed)) {
      log.warn({ envVar, value }, 'Ignoring non-numeric env override');
      continue;
    }
    ensureNested(merged, section)[key] = parsed;
  }

  const sandboxRoot = env.TOOLWARDEN_SANDBOX_ROOT;
  if (sandboxRoot !== undefined) {
    ensureNested(merged, 'sandbox').root = sandboxRoot;
  }

  const host = env.TOOLWARDEN_HOST;
  if (host !== undefined) {
    ensureNested(merged, 'gateway').host = host;
  }

  const extraTools = env.TOOLWARDEN_EXTRA_TOOLS;
  if (extraTools !== undefined) {
    const tools = ensureNested(merged, 'tools');
    const existing = Array.isArray(tools.extra) ? tools.extra : [];
    const fromEnv = extraTools
      .split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0);
    tools.extra = [...existing, ...fromEnv];
    log.info({ count: fromEnv.length }, 'Extra tools set from env var');
  }

  return merged;
}

/**
 * Validates a raw config object, turning Zod issues into a ConfigError.
 *
 * @throws {ConfigError} When validation fails or the limits contradict each other
 */
export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Config validation failed: ${issues}`);
  }

  const { limits } = result.data;
  if (limits.defaultTimeoutSec > limits.maxTimeoutSec) {
    throw new ConfigError(
      `Config validation failed: limits.defaultTimeoutSec (${limits.defaultTimeoutSec}) exceeds limits.maxTimeoutSec (${limits.maxTimeoutSec})`,
    );
  }
  if (!path.isAbsolute(result.data.sandbox.root)) {
    throw new ConfigError('Config validation failed: sandbox.root must be an absolute path');
  }

  return result.data;
}

/**
 * Loads the configuration from disk, applies environment variable overrides,
 * and validates against the ConfigSchema.
 *
 * @returns The fully-resolved and validated Config object
 * @throws {ConfigError} When the config file is malformed or validation fails
 */
export async function loadConfig(): Promise<Config> {
  const rawFile = await readConfigFile();
  const config = parseConfig(applyEnvOverrides(rawFile));
  log.info('Configuration loaded successfully');
  return config;
}

/**
 * Derive the immutable ResourceLimits snapshot shared by every request.
 *
 * @param config - A validated configuration
 */
export function toResourceLimits(config: Config): ResourceLimits {
  return Object.freeze({
    maxTimeoutSec: config.limits.maxTimeoutSec,
    defaultTimeoutSec: config.limits.defaultTimeoutSec,
    maxOutputBytes: config.limits.maxOutputBytes,
    sandboxRoot: path.resolve(config.sandbox.root),
    killGraceMs: config.limits.killGraceMs,
  });
}
