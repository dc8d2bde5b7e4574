/**
 * Terminal formatting for CLI output.
 */

import chalk from 'chalk';
import type { CatalogEntry, ExecutionResponse } from '../types/index.js';

/** Render the catalog as an aligned table, one tool per line. */
export function formatCatalog(entries: readonly CatalogEntry[]): string {
  const nameWidth = Math.max(4, ...entries.map((entry) => entry.name.length));
  const categoryWidth = Math.max(8, ...entries.map((entry) => entry.category.length));

  const header = `${'TOOL'.padEnd(nameWidth)}  ${'CATEGORY'.padEnd(categoryWidth)}  STATUS     VERSION`;
  const rows = entries.map((entry) => {
    const status = entry.available ? chalk.green('available') : chalk.dim('missing  ');
    return `${entry.name.padEnd(nameWidth)}  ${entry.category.padEnd(categoryWidth)}  ${status}  ${entry.version ?? '-'}`;
  });

  const available = entries.filter((entry) => entry.available).length;
  return [chalk.bold(header), ...rows, '', `${available}/${entries.length} tools available`].join('\n');
}

/**
 * Process exit code for `toolwarden run`.
 * Mirrors the tool's own code on tool errors; shell conventions otherwise.
 */
export function exitCodeFor(response: ExecutionResponse): number {
  if (response.status === 'rejected') {
    return 2;
  }
  switch (response.outcome) {
    case 'success':
      return 0;
    case 'tool_error':
      return response.returnCode !== null && response.returnCode > 0 ? response.returnCode : 1;
    case 'timed_out':
      return 124;
    case 'killed':
      return 137;
    case 'spawn_failed':
      return 127;
  }
}
