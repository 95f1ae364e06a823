/**
 * SQLite Cache Store
 *
 * File-backed cache for single-node deployments. SQLite has no native TTL,
 * so entries carry their expiry and stale rows are skipped on read and
 * removed by {@link SqliteCacheStore.purgeExpired}.
 *
 * @packageDocumentation
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { CacheEntry, CacheStore } from './store.js';

/**
 * SQL statements for creating the cache schema.
 */
export const CACHE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS cache_entries (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL,
  stored_at INTEGER NOT NULL,
  ttl_seconds INTEGER NOT NULL,
  expires_at INTEGER NOT NULL
);

-- Index for expiry sweeps
CREATE INDEX IF NOT EXISTS idx_cache_entries_expires_at ON cache_entries(expires_at);
`;

interface EntryRow {
  value: string;
  storedAt: number;
  ttlSeconds: number;
}

export interface SqliteCacheStoreOptions {
  now?: () => number;
}

export class SqliteCacheStore implements CacheStore {
  readonly name = 'sqlite';
  private db: Database.Database;
  private readonly dbPath: string;
  private readonly now: () => number;
  private readonly getStmt: Database.Statement<[string, number], EntryRow>;
  private readonly setStmt: Database.Statement<[string, string, number, number, number]>;
  private readonly purgeStmt: Database.Statement<[number]>;

  /**
   * @param dbPath - Database file, or `:memory:`
   */
  constructor(dbPath: string, opts: SqliteCacheStoreOptions = {}) {
    this.dbPath = dbPath;
    this.now = opts.now ?? Date.now;

    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    // Readers and the writer do not block each other
    this.db.pragma('journal_mode = WAL');
    this.db.exec(CACHE_SCHEMA_SQL);

    this.getStmt = this.db.prepare<[string, number], EntryRow>(`
      SELECT value, stored_at as storedAt, ttl_seconds as ttlSeconds
      FROM cache_entries
      WHERE key = ? AND expires_at > ?
    `);
    this.setStmt = this.db.prepare<[string, string, number, number, number]>(`
      INSERT INTO cache_entries (key, value, stored_at, ttl_seconds, expires_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET
        value = excluded.value,
        stored_at = excluded.stored_at,
        ttl_seconds = excluded.ttl_seconds,
        expires_at = excluded.expires_at
    `);
    this.purgeStmt = this.db.prepare<[number]>('DELETE FROM cache_entries WHERE expires_at <= ?');
  }

  async get(key: string): Promise<CacheEntry | null> {
    const row = this.getStmt.get(key, this.now());
    if (!row) return null;
    return { value: row.value, storedAt: row.storedAt, ttlSeconds: row.ttlSeconds };
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    const expiresAt = entry.storedAt + entry.ttlSeconds * 1000;
    this.setStmt.run(key, entry.value, entry.storedAt, entry.ttlSeconds, expiresAt);
  }

  /**
   * Delete expired rows. Returns the number removed.
   */
  purgeExpired(): number {
    return this.purgeStmt.run(this.now()).changes;
  }

  async close(): Promise<void> {
    this.db.close();
  }

  getDbPath(): string {
    return this.dbPath;
  }
}
