/**
 * Tool Registry
 *
 * Holds the catalog of permitted tools as one immutable snapshot. Readers
 * always see a complete snapshot; reloads and availability refreshes build a
 * new map and swap the reference.
 */

import type { CatalogEntry, ToolDescriptor } from '../types/index.js';
import { RegistryError, errorMessage } from '../errors.js';
import { registryLogger } from '../utils/logger.js';
import { BUILTIN_TOOLS, TOOL_NAME_PATTERN, type ToolDefinition } from './defaults.js';
import type { ToolProber } from './probe.js';

const log = registryLogger;

type Snapshot = ReadonlyMap<string, ToolDescriptor>;

export interface RegistryStatus {
  tools: number;
  available: number;
  lastReloadError: string | null;
}

export interface ToolRegistry {
  /** Descriptor for an exact, case-sensitive name, or undefined. */
  lookup(name: string): ToolDescriptor | undefined;
  contains(name: string): boolean;
  /** Catalog entries sorted by name. */
  list(): CatalogEntry[];
  descriptors(): ToolDescriptor[];
  /** Re-probe one tool. Resolves to the refreshed descriptor, or undefined when not registered. */
  refreshAvailability(name: string): Promise<ToolDescriptor | undefined>;
  refreshAll(): Promise<void>;
  /**
   * Replace the extension list. Resolves false and keeps the current
   * snapshot when the list is invalid.
   */
  reload(extraTools: readonly string[]): Promise<boolean>;
  status(): RegistryStatus;
}

export interface ToolRegistryOptions {
  extraTools?: readonly string[];
  /** Omit to skip availability probing (descriptors stay unprobed) */
  prober?: ToolProber;
  builtins?: readonly ToolDefinition[];
}

function toDescriptor(definition: ToolDefinition): ToolDescriptor {
  return {
    name: definition.name,
    binaryPath: null,
    binary: definition.binary ?? definition.name,
    category: definition.category,
    description: definition.description,
    defaultTimeoutSec: definition.defaultTimeoutSec ?? null,
    available: false,
    version: null,
    lastProbedAt: null,
  };
}

function toCatalogEntry(descriptor: ToolDescriptor): CatalogEntry {
  return {
    name: descriptor.name,
    category: descriptor.category,
    available: descriptor.available,
    version: descriptor.version,
  };
}

/**
 * Merge built-ins with the extension list.
 * Extensions naming a built-in are ignored; the built-in entry wins.
 *
 * @throws {RegistryError} When an extension name is not a valid tool name
 */
export function buildCatalog(builtins: readonly ToolDefinition[], extraTools: readonly string[]): Map<string, ToolDescriptor> {
  const invalid = extraTools.filter((name) => !TOOL_NAME_PATTERN.test(name));
  if (invalid.length > 0) {
    throw new RegistryError(`Invalid extra tool names: ${invalid.map((name) => JSON.stringify(name)).join(', ')}`);
  }

  const catalog = new Map<string, ToolDescriptor>();
  for (const definition of builtins) {
    catalog.set(definition.name, toDescriptor(definition));
  }

  for (const name of extraTools) {
    if (catalog.has(name)) {
      log.debug({ tool: name }, 'Extra tool already registered, skipping');
      continue;
    }
    catalog.set(name, toDescriptor({ name, category: 'custom', description: 'Operator-registered tool' }));
  }

  return catalog;
}

/**
 * Create the registry.
 *
 * @throws {RegistryError} When the initial extension list is invalid
 */
export function createToolRegistry(options: ToolRegistryOptions = {}): ToolRegistry {
  const builtins = options.builtins ?? BUILTIN_TOOLS;
  const prober = options.prober;

  let snapshot: Snapshot = buildCatalog(builtins, options.extraTools ?? []);
  let lastReloadError: string | null = null;

  log.info({ tools: snapshot.size }, 'Tool registry initialized');

  /** Swap in a probed descriptor if its tool is still registered. */
  const commit = (probed: ToolDescriptor): ToolDescriptor | undefined => {
    if (!snapshot.has(probed.name)) {
      return undefined;
    }
    const next = new Map(snapshot);
    next.set(probed.name, probed);
    snapshot = next;
    return probed;
  };

  const sorted = (): ToolDescriptor[] =>
    [...snapshot.values()].sort((a, b) => a.name.localeCompare(b.name));

  return {
    lookup(name: string): ToolDescriptor | undefined {
      return snapshot.get(name);
    },

    contains(name: string): boolean {
      return snapshot.has(name);
    },

    list(): CatalogEntry[] {
      return sorted().map(toCatalogEntry);
    },

    descriptors(): ToolDescriptor[] {
      return sorted();
    },

    async refreshAvailability(name: string): Promise<ToolDescriptor | undefined> {
      const current = snapshot.get(name);
      if (current === undefined) {
        return undefined;
      }
      if (prober === undefined) {
        return current;
      }
      const probed = await prober.probe(current);
      log.debug({ tool: name, available: probed.available, version: probed.version }, 'Tool probed');
      return commit(probed);
    },

    async refreshAll(): Promise<void> {
      if (prober === undefined) {
        return;
      }
      const probed = await Promise.all([...snapshot.values()].map((descriptor) => prober.probe(descriptor)));
      const next = new Map(snapshot);
      for (const descriptor of probed) {
        if (next.has(descriptor.name)) {
          next.set(descriptor.name, descriptor);
        }
      }
      snapshot = next;
      log.info(
        { tools: next.size, available: probed.filter((descriptor) => descriptor.available).length },
        'Tool availability refreshed',
      );
    },

    async reload(extraTools: readonly string[]): Promise<boolean> {
      let next: Map<string, ToolDescriptor>;
      try {
        next = buildCatalog(builtins, extraTools);
      } catch (error: unknown) {
        lastReloadError = errorMessage(error);
        log.error({ error: lastReloadError }, 'Registry reload rejected, keeping current catalog');
        return false;
      }

      // Keep probe results for tools that survive the reload
      for (const [name, descriptor] of snapshot) {
        if (next.has(name)) {
          next.set(name, descriptor);
        }
      }

      snapshot = next;
      lastReloadError = null;
      log.info({ tools: next.size }, 'Tool registry reloaded');

      if (prober !== undefined) {
        const unprobed = [...next.values()].filter((descriptor) => descriptor.lastProbedAt === null);
        const probed = await Promise.all(unprobed.map((descriptor) => prober.probe(descriptor)));
        probed.forEach(commit);
      }
      return true;
    },

    status(): RegistryStatus {
      const descriptors = [...snapshot.values()];
      return {
        tools: descriptors.length,
        available: descriptors.filter((descriptor) => descriptor.available).length,
        lastReloadError,
      };
    },
  };
}
