#!/usr/bin/env node

/**
 * toolwarden CLI entry point.
 * Commands: start, mcp, tools, run, doctor.
 */

import { Command, InvalidArgumentError } from 'commander';
import { runDoctor } from './cli/doctor.js';
import { exitCodeFor, formatCatalog } from './cli/format.js';
import { loadConfig } from './config/index.js';
import { toWireRejection, toWireResult } from './execution/index.js';
import { startApp, startMcp } from './index.js';
import { createEngine } from './startup.js';
import { errorMessage } from './errors.js';
import { VERSION } from './version.js';

function parseTimeout(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive whole number of seconds.');
  }
  return parsed;
}

const program = new Command();

program
  .name('toolwarden')
  .description('Sandboxed execution gateway for command-line security tools')
  .version(VERSION)
  .enablePositionalOptions();

program
  .command('start')
  .description('Start the HTTP gateway')
  .action(async () => {
    try {
      await startApp();
    } catch (error: unknown) {
      console.error(`Failed to start toolwarden: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

program
  .command('mcp')
  .description('Serve the MCP tools over stdio')
  .action(async () => {
    try {
      await startMcp();
    } catch (error: unknown) {
      console.error(`Failed to start MCP server: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

program
  .command('tools')
  .description('List permitted tools and their availability')
  .option('--json', 'Print the catalog as JSON')
  .action(async (options: { json?: boolean }) => {
    try {
      const engine = await createEngine(await loadConfig());
      const catalog = engine.coordinator.catalog();
      console.log(options.json ? JSON.stringify(catalog, null, 2) : formatCatalog(catalog));
      await engine.close();
    } catch (error: unknown) {
      console.error(`Failed to list tools: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

program
  .command('run')
  .description('Run one permitted tool and print the result as JSON')
  .argument('<tool>', 'Tool name')
  .argument('[args...]', 'Arguments passed to the tool verbatim')
  .option('-t, --timeout <seconds>', 'Timeout in seconds', parseTimeout)
  .option('-C, --working-dir <dir>', 'Working directory inside the sandbox')
  .passThroughOptions()
  .action(async (tool: string, args: string[], options: { timeout?: number; workingDir?: string }) => {
    try {
      const engine = await createEngine(await loadConfig(), { probeTools: false });
      const response = await engine.coordinator.execute({
        tool,
        args,
        ...(options.timeout !== undefined ? { timeoutSec: options.timeout } : {}),
        ...(options.workingDir !== undefined ? { workingDir: options.workingDir } : {}),
      });
      await engine.close();

      const payload = response.status === 'rejected' ? toWireRejection(response) : toWireResult(response);
      console.log(JSON.stringify(payload, null, 2));
      process.exit(exitCodeFor(response));
    } catch (error: unknown) {
      console.error(`Run failed: ${errorMessage(error)}`);
      process.exit(1);
    }
  });

program
  .command('doctor')
  .description('Check configuration, sandbox, audit database and tool availability')
  .action(async () => {
    const exitCode = await runDoctor();
    process.exit(exitCode);
  });

await program.parseAsync();
