/**
 * ConfigService: typed, reactive, validated configuration management.
 *
 * Features:
 * - Zod schema validation on load (corrupted JSON → safe defaults)
 * - Typed get<K>/set<K> with full TypeScript inference
 * - onChange<K>() subscriptions: services react to changed keys
 * - reload() picks up edits another cliplog process made to the file
 * - Debounced save (200ms): multiple set() calls → single write
 * - Atomic write (temp file + rename)
 * - Config version tracking + ordered migrations
 *
 * @module main/services/config
 */

import * as fs from 'fs';
import * as fsp from 'fs/promises';
import * as path from 'path';
import { EventEmitter } from 'events';
import { createLogger } from './logger';
import { ClipLogError, ErrorCode } from '../../shared/types/errors';
import {
  ClipLogConfigSchema,
  CONFIG_KEYS,
  CONFIG_MIGRATIONS,
  CURRENT_CONFIG_VERSION,
} from '../../shared/schemas/config-schema';
import type { ClipLogConfig, ConfigKey } from '../../shared/schemas/config-schema';

export type { ClipLogConfig } from '../../shared/schemas/config-schema';

const log = createLogger('Config');

/** Delay before flushing config to disk (ms). Multiple set() calls within this window = single write. */
const SAVE_DELAY_MS = 200;

type ChangeCallback<K extends keyof ClipLogConfig> = (newVal: ClipLogConfig[K], oldVal: ClipLogConfig[K]) => void;

type StoredListener = (config: ClipLogConfig, previous: ClipLogConfig) => void;

export class ConfigService extends EventEmitter {
  private readonly configPath: string;
  private config: ClipLogConfig;
  private saveTimer: ReturnType<typeof setTimeout> | null = null;
  private saving = false;
  private pendingSave = false;

  /** Per-key change listeners */
  private keyListeners = new Map<keyof ClipLogConfig, Set<StoredListener>>();

  constructor(configPath: string) {
    super();
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  getPath(): string {
    return this.configPath;
  }

  // ────────────── Load / Save ──────────────

  private loadConfig(): ClipLogConfig {
    let raw: Record<string, unknown> = {};

    try {
      if (fs.existsSync(this.configPath)) {
        const data = fs.readFileSync(this.configPath, 'utf8');
        const parsed: unknown = JSON.parse(data);
        if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
          raw = Object.fromEntries(Object.entries(parsed));
        } else {
          log.warn('Config file is not a JSON object, using defaults');
        }
      }
    } catch (error) {
      log.error('Failed to read config file, using defaults:', error);
    }

    raw = this.migrateConfig(raw);

    // Safe parse fills in defaults
    const result = ClipLogConfigSchema.safeParse(raw);
    if (result.success) {
      return result.data;
    }

    log.warn('Config validation failed, applying defaults. Issues:', result.error.issues);
    // Partial recovery: keep the fields that validate on their own
    return ClipLogConfigSchema.parse(this.pickValidFields(raw));
  }

  /**
   * Pick fields from raw config that individually pass validation.
   */
  private pickValidFields(raw: Record<string, unknown>): Record<string, unknown> {
    const recovered: Record<string, unknown> = { _version: CURRENT_CONFIG_VERSION };
    for (const [key, value] of Object.entries(raw)) {
      if (ClipLogConfigSchema.safeParse({ [key]: value }).success) {
        recovered[key] = value;
      }
    }
    return recovered;
  }

  /**
   * Run ordered migrations on raw config data.
   */
  private migrateConfig(raw: Record<string, unknown>): Record<string, unknown> {
    let version = typeof raw._version === 'number' ? raw._version : 0;
    let migrated = { ...raw };

    while (version < CURRENT_CONFIG_VERSION) {
      const migration = CONFIG_MIGRATIONS[version];
      if (migration) {
        log.info(`Migrating config v${version} → v${version + 1}`);
        migrated = migration(migrated);
      }
      version++;
    }

    migrated._version = CURRENT_CONFIG_VERSION;
    return migrated;
  }

  private scheduleSave(): void {
    if (this.saveTimer) clearTimeout(this.saveTimer);
    this.saveTimer = setTimeout(() => {
      this.saveTimer = null;
      this.flushSave().catch((error) => log.error('Failed to save config:', error));
    }, SAVE_DELAY_MS);
  }

  /**
   * Atomic write: write to temp file, then rename.
   */
  private async flushSave(): Promise<void> {
    if (this.saving) {
      this.pendingSave = true;
      return;
    }
    this.saving = true;
    try {
      await fsp.mkdir(path.dirname(this.configPath), { recursive: true });
      const tmpPath = this.configPath + '.tmp';
      await fsp.writeFile(tmpPath, JSON.stringify(this.config, null, 2), 'utf8');
      await fsp.rename(tmpPath, this.configPath);
    } catch (error) {
      throw ClipLogError.from(error, ErrorCode.CONFIG_SAVE_ERROR, { path: this.configPath });
    } finally {
      this.saving = false;
      if (this.pendingSave) {
        this.pendingSave = false;
        this.flushSave().catch((error) => log.error('Failed to save config:', error));
      }
    }
  }

  /**
   * Force immediate save: use from the CLI and during shutdown.
   */
  async forceSave(): Promise<void> {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = null;
    }
    await this.flushSave();
  }

  /**
   * Re-read the file and notify listeners of every key whose value differs.
   */
  reload(): ConfigKey[] {
    const previous = this.config;
    this.config = this.loadConfig();

    const changed = CONFIG_KEYS.filter((key) => previous[key] !== this.config[key]);
    if (changed.length > 0) {
      log.info(`Config reloaded, changed: ${changed.join(', ')}`);
      this.notifyChange(changed, previous);
    }
    return changed;
  }

  // ────────────── Typed accessors ──────────────

  get<K extends keyof ClipLogConfig>(key: K): ClipLogConfig[K] {
    return this.config[key];
  }

  /**
   * Set a single config value. Triggers debounced save and change notifications.
   */
  set<K extends keyof ClipLogConfig>(key: K, value: ClipLogConfig[K]): void {
    if (this.config[key] === value) return;

    const previous = { ...this.config };
    this.config[key] = value;
    this.notifyChange([key], previous);
    this.scheduleSave();
  }

  /**
   * Set a value given as CLI text. JSON literals (`true`, `250`) are decoded,
   * anything else is taken as a plain string, then the result is validated.
   */
  setFromString(key: ConfigKey, rawValue: string): ClipLogConfig[ConfigKey] {
    let decoded: unknown = rawValue;
    try {
      decoded = JSON.parse(rawValue);
    } catch {
      decoded = rawValue;
    }

    const result = ClipLogConfigSchema.safeParse({ ...this.config, [key]: decoded });
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ClipLogError(`Invalid value for ${key}: ${issue?.message ?? 'rejected'}`, ErrorCode.CONFIG_VALIDATION_ERROR, {
        context: { key, value: rawValue },
      });
    }

    const next = result.data;
    const previous = { ...this.config };
    if (previous[key] === next[key]) return next[key];

    this.config = next;
    this.notifyChange([key], previous);
    this.scheduleSave();
    return next[key];
  }

  getAll(): ClipLogConfig {
    return { ...this.config };
  }

  // ────────────── Reactive subscriptions ──────────────

  /**
   * Subscribe to changes of a specific config key.
   * Returns an unsubscribe function.
   *
   * @example
   * const unsub = config.onChange('pollIntervalMs', (ms) => watcher.setPollInterval(ms));
   */
  onChange<K extends keyof ClipLogConfig>(key: K, callback: ChangeCallback<K>): () => void {
    const listener: StoredListener = (current, previous) => callback(current[key], previous[key]);
    let listeners = this.keyListeners.get(key);
    if (!listeners) {
      listeners = new Set();
      this.keyListeners.set(key, listeners);
    }
    listeners.add(listener);
    return () => {
      this.keyListeners.get(key)?.delete(listener);
    };
  }

  private notifyChange(keys: Array<keyof ClipLogConfig>, previous: ClipLogConfig): void {
    for (const key of keys) {
      const listeners = this.keyListeners.get(key);
      if (!listeners) continue;
      for (const cb of listeners) {
        try {
          cb(this.config, previous);
        } catch (err) {
          log.error(`Config onChange listener error for key "${String(key)}":`, err);
        }
      }
    }

    this.emit('change', keys);
  }

  // ────────────── Shutdown ──────────────

  async shutdown(): Promise<void> {
    if (this.saveTimer) {
      await this.forceSave();
    }
    this.keyListeners.clear();
    this.removeAllListeners();
  }
}
