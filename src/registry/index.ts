/**
 * Tool registry barrel export.
 */

export { BUILTIN_TOOLS, TOOL_NAME_PATTERN, type ToolDefinition } from './defaults.js';
export { createToolProber, resolveExecutable, type ToolProber, type ToolProberOptions } from './probe.js';
export {
  buildCatalog,
  createToolRegistry,
  type RegistryStatus,
  type ToolRegistry,
  type ToolRegistryOptions,
} from './tool-registry.js';
