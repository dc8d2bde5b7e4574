/**
 * Security module: input validation and sandbox construction.
 */

export {
  FORBIDDEN_ARGUMENT_CHARS,
  MAX_ARGUMENTS,
  MAX_ARGUMENT_LENGTH,
  isWithin,
  sanitizeArguments,
  validateToolName,
  validateWorkingDirectory,
} from './validator.js';
export type { ValidationFailure, ValidationOutcome } from './validator.js';
export {
  ENV_ALLOWLIST,
  MIN_TIMEOUT_SEC,
  computeEffectiveTimeout,
  createSandboxEnvironmentBuilder,
  isForbiddenEnvName,
} from './environment.js';
export type { SandboxEnvironmentBuilder, SandboxEnvironmentOptions } from './environment.js';
