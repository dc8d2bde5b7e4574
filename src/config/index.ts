/**
 * Config module public API.
 * Re-exports schema, types, and loader functions.
 */

export { ConfigSchema, DEFAULT_SANDBOX_PATH, type Config } from './schema.js';
export {
  loadConfig,
  parseConfig,
  applyEnvOverrides,
  toResourceLimits,
  homeDir,
  configFilePath,
  auditDbPath,
} from './loader.js';
