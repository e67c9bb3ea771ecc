/**
 * Zod schema for cliplog configuration.
 *
 * Single source of truth for config shape, defaults, and validation.
 * The ClipLogConfig type is derived from this schema via z.infer<>.
 *
 * @module shared/schemas/config-schema
 */

import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

// ─── Main config schema ───

export const ClipLogConfigSchema = z.object({
  /** Schema version for migrations */
  _version: z.number().default(1),

  // ── Clipboard watcher ──
  pollIntervalMs: z.number().int().min(50).max(60_000).default(400),
  clipboardReadTimeoutMs: z.number().int().positive().default(1000),

  // ── Lifecycle ──
  stopTimeoutMs: z.number().int().positive().default(5000),
  signalTimeoutMs: z.number().int().positive().default(1000),
  startHidden: z.boolean().default(false),

  // ── History store ──
  busyTimeoutMs: z.number().int().min(0).default(2000),

  // ── Display surface ──
  viewLimit: z.number().int().positive().max(500).default(20),
  viewRefreshMs: z.number().int().min(100).default(1000),

  // ── Logging ──
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

// ─── Derived types ───

/** Full config after parsing (defaults applied, all fields present) */
export type ClipLogConfig = z.infer<typeof ClipLogConfigSchema>;

/** Config input (all fields optional, for file data or partial updates) */
export type ClipLogConfigInput = z.input<typeof ClipLogConfigSchema>;

/** Keys a user may read or write from the CLI */
export const CONFIG_KEYS = [
  'pollIntervalMs',
  'clipboardReadTimeoutMs',
  'stopTimeoutMs',
  'signalTimeoutMs',
  'startHidden',
  'busyTimeoutMs',
  'viewLimit',
  'viewRefreshMs',
  'logLevel',
] as const satisfies ReadonlyArray<keyof ClipLogConfig>;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

// ─── Migration system ───

export const CURRENT_CONFIG_VERSION = 1;

export type ConfigMigration = (config: Record<string, unknown>) => Record<string, unknown>;

/**
 * Ordered migrations: key = source version, value = transform to next version.
 * Example: `0: (cfg) => ({ ...cfg, newField: 'default' })` migrates v0 → v1.
 */
export const CONFIG_MIGRATIONS: Record<number, ConfigMigration> = {
  0: (cfg) => ({ ...cfg, _version: 1 }),
};
