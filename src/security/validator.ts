/**
 * Input Validator
 *
 * Stateless checks run before anything touches the process layer.
 * Each check returns a ValidationOutcome; the coordinator stops at the
 * first failure.
 *
 * Arguments arrive pre-tokenized and are matched on raw content. Quoting
 * inside a token changes nothing: the characters themselves are refused.
 */

import { realpathSync } from 'node:fs';
import path from 'node:path';
import type { ValidationErrorKind } from '../types/index.js';
import { TOOL_NAME_PATTERN } from '../registry/defaults.js';

/** Maximum number of argument tokens per request */
export const MAX_ARGUMENTS = 128;

/** Maximum length of a single argument token, in characters */
export const MAX_ARGUMENT_LENGTH = 4096;

/** Shell metacharacters refused anywhere in an argument */
export const FORBIDDEN_ARGUMENT_CHARS: readonly string[] = [';', '&', '|', '`', '$', '(', ')', '<', '>', '\n'];

// C0 controls and DEL; covers \n, \r, \t and NUL
const CONTROL_CHAR_PATTERN = /[\u0000-\u001f\u007f]/;

/** A failed check */
export interface ValidationFailure {
  ok: false;
  error: ValidationErrorKind;
  /** Whitelist miss or disallowed character */
  securityViolation: boolean;
  message: string;
}

export type ValidationOutcome<T> = { ok: true; value: T } | ValidationFailure;

function fail(error: ValidationErrorKind, message: string, securityViolation: boolean): ValidationFailure {
  return { ok: false, error, securityViolation, message };
}

/**
 * Check a tool name against the allowed character set and length.
 * Registry membership is checked separately by the coordinator.
 */
export function validateToolName(name: unknown): ValidationOutcome<string> {
  if (typeof name !== 'string' || !TOOL_NAME_PATTERN.test(name)) {
    return fail('InvalidToolName', 'Tool name contains invalid characters', true);
  }
  return { ok: true, value: name };
}

/**
 * Check a pre-tokenized argument list.
 * Rejects non-string tokens, control characters, shell metacharacters,
 * too many tokens and over-long tokens.
 */
export function sanitizeArguments(args: readonly unknown[] | undefined): ValidationOutcome<string[]> {
  if (args === undefined) {
    return { ok: true, value: [] };
  }

  if (args.length > MAX_ARGUMENTS) {
    return fail('DisallowedArgument', `Too many arguments (maximum ${MAX_ARGUMENTS})`, false);
  }

  const sanitized: string[] = [];
  for (const [index, token] of args.entries()) {
    if (typeof token !== 'string') {
      return fail('DisallowedArgument', `Argument ${index} is not a string`, false);
    }
    if (token.length > MAX_ARGUMENT_LENGTH) {
      return fail('DisallowedArgument', `Argument ${index} exceeds ${MAX_ARGUMENT_LENGTH} characters`, false);
    }
    const forbidden = FORBIDDEN_ARGUMENT_CHARS.find((char) => token.includes(char));
    if (forbidden !== undefined || CONTROL_CHAR_PATTERN.test(token)) {
      return fail('DisallowedArgument', `Argument ${index} contains a disallowed character`, true);
    }
    sanitized.push(token);
  }

  return { ok: true, value: sanitized };
}

/**
 * Canonicalize a requested working directory and require it to stay inside
 * the sandbox root.
 *
 * Relative paths resolve against the sandbox root. Symlinks are resolved for
 * the deepest existing ancestor, so a missing leaf under a symlinked parent
 * is judged by where the parent really points. Containment is decided on
 * path segments: `/sandbox2` is not inside `/sandbox`.
 *
 * @returns The canonical absolute path
 */
export function validateWorkingDirectory(requested: unknown, sandboxRoot: string): ValidationOutcome<string> {
  if (typeof requested !== 'string' || requested.length === 0 || requested.includes('\0')) {
    return fail('PathEscapesSandbox', 'Working directory is not a valid path', false);
  }

  const canonicalRoot = canonicalize(path.resolve(sandboxRoot));
  const candidate = canonicalize(path.resolve(canonicalRoot, requested));

  if (!isWithin(canonicalRoot, candidate)) {
    return fail('PathEscapesSandbox', 'Working directory resolves outside the sandbox', false);
  }

  return { ok: true, value: candidate };
}

/**
 * Segment-wise containment test on two absolute, normalized paths.
 */
export function isWithin(root: string, candidate: string): boolean {
  const rootSegments = splitSegments(root);
  const candidateSegments = splitSegments(candidate);

  if (candidateSegments.length < rootSegments.length) {
    return false;
  }
  return rootSegments.every((segment, index) => candidateSegments[index] === segment);
}

function splitSegments(absolutePath: string): string[] {
  return path.normalize(absolutePath).split(path.sep).filter((segment) => segment.length > 0);
}

/**
 * Resolve symlinks for the longest existing prefix of an absolute path and
 * re-append the missing tail.
 */
function canonicalize(absolutePath: string): string {
  const missing: string[] = [];
  let current = path.normalize(absolutePath);

  for (;;) {
    try {
      const real = realpathSync(current);
      return missing.length > 0 ? path.join(real, ...missing.reverse()) : real;
    } catch {
      // missing or unreadable: walk up one level
      const parent = path.dirname(current);
      if (parent === current) {
        return path.normalize(absolutePath);
      }
      missing.push(path.basename(current));
      current = parent;
    }
  }
}
