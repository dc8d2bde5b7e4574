/**
 * Doctor command.
 *
 * Runs environment checks and prints a diagnostic report:
 * Node.js version, config, sandbox root, audit database, tool availability.
 */

import { accessSync, constants, existsSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import chalk from 'chalk';
import { auditDbPath, configFilePath, loadConfig, type Config } from '../config/index.js';
import { createDatabase } from '../persistence/index.js';
import { createProcessExecutor } from '../execution/index.js';
import { createToolProber, createToolRegistry } from '../registry/index.js';
import { errorMessage } from '../errors.js';

export interface CheckResult {
  name: string;
  passed: boolean;
  message: string;
}

/**
 * Run every check and return the results.
 * Checks that need a valid config are skipped when it does not load.
 */
export async function getDoctorResults(): Promise<CheckResult[]> {
  const checks: CheckResult[] = [checkNodeVersion(), checkConfigExists()];

  let config: Config;
  try {
    config = await loadConfig();
    checks.push({ name: 'Config validation', passed: true, message: `Valid (version ${config.version})` });
  } catch (error: unknown) {
    checks.push({ name: 'Config validation', passed: false, message: errorMessage(error) });
    return checks;
  }

  checks.push(checkSandboxRoot(config.sandbox.root));
  if (config.audit.sqlite) {
    checks.push(checkAuditDatabase(auditDbPath()));
  }
  checks.push(await checkToolAvailability(config));
  return checks;
}

/**
 * Print the report.
 * @returns 0 when every check passed, 1 otherwise
 */
export async function runDoctor(): Promise<number> {
  console.log(chalk.bold('\n  toolwarden doctor\n'));

  const checks = await getDoctorResults();
  for (const check of checks) {
    const icon = check.passed ? chalk.green('ok  ') : chalk.red('FAIL');
    console.log(`  ${icon}  ${check.name}: ${check.message}`);
  }

  const allPassed = checks.every((check) => check.passed);
  console.log('');
  console.log(allPassed ? chalk.green('  All checks passed.\n') : chalk.yellow('  Some checks failed. Fix the issues above.\n'));
  return allPassed ? 0 : 1;
}

export function checkNodeVersion(version: string = process.versions.node): CheckResult {
  const major = Number.parseInt(version.split('.')[0] ?? '0', 10);
  if (major >= 20) {
    return { name: 'Node.js version', passed: true, message: `v${version} (>= 20 required)` };
  }
  return { name: 'Node.js version', passed: false, message: `v${version}, requires Node.js 20+` };
}

/** A missing config file passes: defaults apply. */
export function checkConfigExists(): CheckResult {
  const configPath = configFilePath();
  if (existsSync(configPath)) {
    return { name: 'Config file', passed: true, message: configPath };
  }
  return { name: 'Config file', passed: true, message: `Not found at ${configPath}, using defaults` };
}

export function checkSandboxRoot(root: string): CheckResult {
  const resolved = path.resolve(root);
  if (!existsSync(resolved)) {
    const parent = path.dirname(resolved);
    try {
      accessSync(parent, constants.W_OK);
      return { name: 'Sandbox root', passed: true, message: `${resolved} (created on first start)` };
    } catch {
      return { name: 'Sandbox root', passed: false, message: `${resolved} does not exist and ${parent} is not writable` };
    }
  }
  try {
    accessSync(resolved, constants.R_OK | constants.W_OK | constants.X_OK);
    return { name: 'Sandbox root', passed: true, message: resolved };
  } catch {
    return { name: 'Sandbox root', passed: false, message: `${resolved} is not accessible` };
  }
}

export function checkAuditDatabase(dbPath: string): CheckResult {
  if (!existsSync(dbPath)) {
    return { name: 'Audit database', passed: true, message: `${dbPath} (created on first start)` };
  }
  try {
    const dbManager = createDatabase(dbPath);
    try {
      const version = dbManager.runMigrations();
      return { name: 'Audit database', passed: true, message: `${dbPath}, schema version ${version}` };
    } finally {
      dbManager.close();
    }
  } catch (error: unknown) {
    return { name: 'Audit database', passed: false, message: errorMessage(error) };
  }
}

export async function checkToolAvailability(config: Config): Promise<CheckResult> {
  try {
    const registry = createToolRegistry({
      extraTools: config.tools.extra,
      prober: createToolProber({
        executor: createProcessExecutor(),
        searchPath: config.sandbox.path,
        workdir: os.tmpdir(),
        timeoutMs: config.tools.probeTimeoutMs,
      }),
    });
    await registry.refreshAll();
    const { tools, available } = registry.status();
    return {
      name: 'Tools',
      passed: available > 0,
      message: available > 0
        ? `${available} of ${tools} available`
        : `none of ${tools} tools found on ${config.sandbox.path}`,
    };
  } catch (error: unknown) {
    return { name: 'Tools', passed: false, message: errorMessage(error) };
  }
}
