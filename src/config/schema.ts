/**
 * Configuration schema for toolwarden.
 * Defines the full Zod schema with defaults for every setting.
 */

import { z } from 'zod';

/** PATH handed to sandboxed tools; sbin entries included for network tooling */
export const DEFAULT_SANDBOX_PATH = '/usr/local/sbin:/usr/local/bin:/usr/sbin:/usr/bin:/sbin:/bin';

/** Largest delay Node timers accept, in milliseconds */
const MAX_TIMER_MS = 2_147_483_647;
const MAX_TIMER_SEC = Math.floor(MAX_TIMER_MS / 1000);

export const ConfigSchema = z.object({
  version: z.number().default(1),
  limits: z.object({
    maxTimeoutSec: z.number().int().positive().max(MAX_TIMER_SEC).default(300),
    defaultTimeoutSec: z.number().int().positive().max(MAX_TIMER_SEC).default(60),
    maxOutputBytes: z.number().int().positive().default(1_048_576),
    killGraceMs: z.number().int().nonnegative().max(MAX_TIMER_MS).default(2_000),
  }).default({}),
  sandbox: z.object({
    root: z.string().min(1).default('/tmp/toolwarden'),
    path: z.string().min(1).default(DEFAULT_SANDBOX_PATH),
    /** Extra parent variables copied into the tool environment */
    envAllowlist: z.array(z.string()).default([]),
  }).default({}),
  tools: z.object({
    extra: z.array(z.string()).default([]),
    probeTimeoutMs: z.number().int().positive().max(MAX_TIMER_MS).default(5_000),
  }).default({}),
  gateway: z.object({
    host: z.string().default('127.0.0.1'),
    port: z.number().int().min(0).max(65_535).default(5000),
    corsOrigins: z.array(z.string()).default(['*']),
    /** Serve GET /api/v1/audit; rows carry full request arguments */
    exposeAudit: z.boolean().default(false),
  }).default({}),
  audit: z.object({
    sqlite: z.boolean().default(true),
  }).default({}),
});

/** Fully-resolved configuration type inferred from the Zod schema */
export type Config = z.infer<typeof ConfigSchema>;
