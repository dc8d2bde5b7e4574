/**
 * Availability probe for registered tools.
 * Looks the executable up on the sandbox PATH and asks it for a version
 * string, both bounded by the probe timeout.
 */

import { access, stat } from 'node:fs/promises';
import { constants } from 'node:fs';
import path from 'node:path';
import type { ToolDescriptor } from '../types/index.js';
import type { Executor } from '../execution/process-executor.js';
import { errorMessage } from '../errors.js';
import { registryLogger } from '../utils/logger.js';

const VERSION_OUTPUT_LIMIT = 4096;
const VERSION_KILL_GRACE_MS = 500;

export interface ToolProber {
  /** Return a fresh descriptor with availability, path and version filled in. Never rejects. */
  probe(descriptor: ToolDescriptor): Promise<ToolDescriptor>;
}

export interface ToolProberOptions {
  executor: Executor;
  searchPath: string;
  /** cwd for the version probe */
  workdir: string;
  timeoutMs: number;
}

/**
 * Find an executable regular file named `binary` on a PATH string.
 *
 * @returns The absolute path, or null when nothing executable matches
 */
export async function resolveExecutable(binary: string, searchPath: string): Promise<string | null> {
  for (const dir of searchPath.split(path.delimiter)) {
    if (dir.length === 0 || !path.isAbsolute(dir)) continue;
    const candidate = path.join(dir, binary);
    try {
      const info = await stat(candidate);
      if (!info.isFile()) continue;
      await access(candidate, constants.X_OK);
      return candidate;
    } catch {
      continue;
    }
  }
  return null;
}

/**
 * Create a prober that runs version probes through the given executor.
 */
export function createToolProber(options: ToolProberOptions): ToolProber {
  const { executor, searchPath, workdir, timeoutMs } = options;

  async function readVersion(descriptor: ToolDescriptor, binaryPath: string): Promise<string | null> {
    const outcome = await executor.run({
      tool: descriptor.name,
      binary: binaryPath,
      argv: ['--version'],
      env: { PATH: searchPath, LANG: 'C.UTF-8' },
      cwd: workdir,
      limits: { timeoutMs, maxOutputBytes: VERSION_OUTPUT_LIMIT, killGraceMs: VERSION_KILL_GRACE_MS },
    });

    if (outcome.state !== 'completed' || outcome.returnCode !== 0) {
      return null;
    }
    const firstLine = (outcome.stdout || outcome.stderr)
      .split('\n')
      .map((line) => line.trim())
      .find((line) => line.length > 0);
    return firstLine ?? null;
  }

  return {
    async probe(descriptor: ToolDescriptor): Promise<ToolDescriptor> {
      const probedAt = new Date();
      try {
        const binaryPath = await withDeadline(resolveExecutable(descriptor.binary, searchPath), timeoutMs);
        if (binaryPath === null) {
          registryLogger.debug({ tool: descriptor.name }, 'Tool not found on sandbox PATH');
          return { ...descriptor, binaryPath: null, available: false, version: null, lastProbedAt: probedAt };
        }

        const version = await readVersion(descriptor, binaryPath);
        return { ...descriptor, binaryPath, available: true, version, lastProbedAt: probedAt };
      } catch (error: unknown) {
        registryLogger.warn({ tool: descriptor.name, error: errorMessage(error) }, 'Availability probe failed');
        return { ...descriptor, available: false, lastProbedAt: probedAt };
      }
    },
  };
}

/** Reject if `promise` has not settled within `timeoutMs`. */
async function withDeadline<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_resolve, reject) => {
    timeoutHandle = setTimeout(
      () => reject(new Error(`Probe timed out after ${timeoutMs}ms`)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutHandle);
  }
}
