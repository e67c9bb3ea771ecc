/**
 * HistoryStore: SQLite-backed append-only clipboard history.
 *
 * One writer, any number of readers: WAL journal mode keeps readers off
 * half-written rows, and every append runs in a BEGIN IMMEDIATE transaction so
 * the consecutive-duplicate check and the insert are atomic even when another
 * process (e.g. `cliplog list` while the agent runs) holds the same file.
 *
 * Ids come from AUTOINCREMENT and are never reused: deleteAll() leaves the
 * sequence where it was.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from './logger';
import { ClipLogError, ErrorCode } from '../../shared/types/errors';
import type { ClipItem, FetchOrder, HistoryQueryOptions } from '../../shared/types/clip';

const log = createLogger('HistoryStore');

// ─── Schema version for migrations ───
const SCHEMA_VERSION = 1;

const IN_MEMORY = ':memory:';

export interface ClipRow {
  id: number;
  text: string;
  captured_at: string;
}

export interface HistoryStoreOptions {
  /** SQLite busy timeout (ms) when another connection holds the write lock */
  busyTimeoutMs?: number;
  /** Clock used for capture timestamps */
  now?: () => Date;
}

interface Statements {
  insert: Database.Statement<[string, string]>;
  latest: Database.Statement<[], ClipRow>;
  byId: Database.Statement<[number], ClipRow>;
  count: Database.Statement<[], { count: number }>;
  maxId: Database.Statement<[], { maxId: number | null }>;
  deleteAll: Database.Statement<[]>;
}

/** YYYY-MM-DD in the machine's local timezone */
export function formatLocalDate(date: Date): string {
  const yyyy = date.getFullYear();
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}

/** Escape LIKE wildcards so user search text matches literally */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export class HistoryStore {
  private db: Database.Database | null = null;
  private stmts: Statements | null = null;
  private appendTx: Database.Transaction<(text: string) => ClipItem | null> | null = null;
  private readonly dbPath: string;
  private busyTimeoutMs: number;
  private readonly now: () => Date;

  constructor(dbPath: string, options: HistoryStoreOptions = {}) {
    this.dbPath = dbPath;
    this.busyTimeoutMs = options.busyTimeoutMs ?? 2000;
    this.now = options.now ?? (() => new Date());
  }

  getPath(): string {
    return this.dbPath;
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  getBusyTimeout(): number {
    return this.busyTimeoutMs;
  }

  /** Applies to the open connection and to later opens */
  setBusyTimeout(ms: number): void {
    this.busyTimeoutMs = ms;
    if (this.db) {
      this.db.pragma(`busy_timeout = ${Math.max(0, Math.floor(ms))}`);
    }
  }

  // ─── Lifecycle ───

  initialize(): void {
    if (this.db) return;

    try {
      if (this.dbPath !== IN_MEMORY) {
        fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }

      log.debug(`Opening database at ${this.dbPath}`);
      const db = new Database(this.dbPath, { timeout: this.busyTimeoutMs });

      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');

      this.db = db;
      this.runMigrations(db);
      this.prepareStatements(db);
    } catch (err) {
      this.closeQuietly();
      throw ClipLogError.from(err, ErrorCode.STORE_UNAVAILABLE, { operation: 'open', path: this.dbPath });
    }
  }

  close(): void {
    if (!this.db) return;
    const db = this.db;
    this.db = null;
    this.stmts = null;
    this.appendTx = null;
    try {
      if (this.dbPath !== IN_MEMORY) {
        db.pragma('wal_checkpoint(TRUNCATE)');
      }
      db.close();
      log.debug('Database closed');
    } catch (err) {
      log.error('Error closing database:', err);
    }
  }

  // ─── Migrations ───

  private runMigrations(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `);

    const current = db.prepare<[], { v: number | null }>('SELECT MAX(version) as v FROM schema_version').get();
    const version = current?.v ?? 0;

    if (version < 1) {
      this.migrateV1(db);
    }

    if (version > SCHEMA_VERSION) {
      log.warn(`Database schema v${version} is newer than this build (v${SCHEMA_VERSION})`);
    }
  }

  private migrateV1(db: Database.Database): void {
    log.info('Running migration v1: initial schema');

    db.exec(`
      BEGIN IMMEDIATE;
      CREATE TABLE IF NOT EXISTS clipboard_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        text TEXT NOT NULL,
        captured_at TEXT NOT NULL
      );
      INSERT OR IGNORE INTO schema_version (version) VALUES (1);
      COMMIT;
    `);
  }

  private prepareStatements(db: Database.Database): void {
    this.stmts = {
      insert: db.prepare<[string, string]>(`INSERT INTO clipboard_history (text, captured_at) VALUES (?, ?)`),
      latest: db.prepare<[], ClipRow>(`SELECT id, text, captured_at FROM clipboard_history ORDER BY id DESC LIMIT 1`),
      byId: db.prepare<[number], ClipRow>(`SELECT id, text, captured_at FROM clipboard_history WHERE id = ?`),
      count: db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM clipboard_history`),
      maxId: db.prepare<[], { maxId: number | null }>(`SELECT MAX(id) as maxId FROM clipboard_history`),
      deleteAll: db.prepare<[]>(`DELETE FROM clipboard_history`),
    };

    const stmts = this.stmts;
    this.appendTx = db.transaction((text: string): ClipItem | null => {
      const last = stmts.latest.get();
      if (last && last.text === text) return null;

      const capturedAtUtc = this.now().toISOString();
      const info = stmts.insert.run(text, capturedAtUtc);
      return this.rowToItem({ id: Number(info.lastInsertRowid), text, captured_at: capturedAtUtc });
    });
  }

  // ─── Writes ───

  /**
   * Append a snippet. Blank text and text equal to the newest row are no-ops
   * (returns null). Throws STORE_UNAVAILABLE when the file cannot be written.
   */
  append(text: string): ClipItem | null {
    if (text.trim().length === 0) return null;

    return this.run('append', () => {
      const tx = this.appendTx;
      if (!tx) throw this.notOpen();
      return tx.immediate(text);
    });
  }

  /** Remove every row. Returns the number of rows deleted. */
  deleteAll(): number {
    return this.run('deleteAll', (stmts) => {
      const result = stmts.deleteAll.run();
      log.info(`Deleted ${result.changes} clipboard entries`);
      return result.changes;
    });
  }

  // ─── Reads ───

  fetchAll(order: FetchOrder): ClipItem[] {
    return this.query({ order });
  }

  fetchById(id: number): ClipItem | null {
    return this.run('fetchById', (stmts) => {
      const row = stmts.byId.get(id);
      return row ? this.rowToItem(row) : null;
    });
  }

  /**
   * Filtered read. With `limit`, the newest matching rows are kept and then
   * returned in the requested order.
   */
  query(options: HistoryQueryOptions = {}): ClipItem[] {
    const order = options.order ?? 'newest';
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (options.search) {
      conditions.push(`text LIKE ? ESCAPE '\\'`);
      params.push(`%${escapeLike(options.search)}%`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const direction = order === 'newest' ? 'DESC' : 'ASC';

    let sql = `SELECT id, text, captured_at FROM clipboard_history ${where} ORDER BY id ${direction}`;
    if (options.limit !== undefined) {
      params.push(options.limit);
      sql = `SELECT * FROM (
               SELECT id, text, captured_at FROM clipboard_history ${where} ORDER BY id DESC LIMIT ?
             ) ORDER BY id ${direction}`;
    }

    return this.run('query', (_stmts, db) => {
      const rows = db.prepare<Array<string | number>, ClipRow>(sql).all(...params);
      return rows.map((r) => this.rowToItem(r));
    });
  }

  /** Substring match on text, newest first unless told otherwise */
  search(text: string, options: Omit<HistoryQueryOptions, 'search'> = {}): ClipItem[] {
    return this.query({ ...options, search: text });
  }

  /** The newest `limit` items, returned in `order` */
  fetchRecent(limit: number, order: FetchOrder = 'newest'): ClipItem[] {
    return this.query({ order, limit });
  }

  count(): number {
    return this.run('count', (stmts) => stmts.count.get()?.count ?? 0);
  }

  /** Newest id, or null when the log is empty */
  latestId(): number | null {
    return this.run('latestId', (stmts) => stmts.maxId.get()?.maxId ?? null);
  }

  // ─── Private helpers ───

  private run<T>(operation: string, fn: (stmts: Statements, db: Database.Database) => T): T {
    const db = this.db;
    const stmts = this.stmts;
    if (!db || !stmts) throw this.notOpen();

    try {
      return fn(stmts, db);
    } catch (err) {
      throw ClipLogError.from(err, ErrorCode.STORE_UNAVAILABLE, { operation, path: this.dbPath });
    }
  }

  private notOpen(): ClipLogError {
    return new ClipLogError('History store is not open', ErrorCode.STORE_UNAVAILABLE, {
      context: { path: this.dbPath },
    });
  }

  private closeQuietly(): void {
    try {
      this.db?.close();
    } catch (err) {
      log.debug('Close after failed open:', err);
    }
    this.db = null;
    this.stmts = null;
    this.appendTx = null;
  }

  private rowToItem(row: ClipRow): ClipItem {
    return {
      id: row.id,
      text: row.text,
      capturedAtUtc: row.captured_at,
      localDate: formatLocalDate(new Date(row.captured_at)),
    };
  }
}
