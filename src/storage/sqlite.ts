/**
 * SQLite Storage Layer
 *
 * Persists device metadata and the offline index copy using better-sqlite3.
 * Secret values (PIN hash, wrapped master key, token) are written by
 * DeviceSecrets; the raw master key is never stored.
 */

import Database from "better-sqlite3";
import type { CachedIndex, IndexCache, KeyValueStore } from "./types.js";

export interface SQLiteStorageOptions {
  /** Path to database file. Use ":memory:" for in-memory database */
  path: string;
  /** Vault name/namespace for this storage instance */
  vaultName: string;
}

interface IndexRow {
  content: Buffer;
  sha: string;
  cached_at: string;
}

/**
 * SQLite-backed storage for one vault's device state
 */
export class SQLiteStorage implements KeyValueStore, IndexCache {
  private db: Database.Database;
  private vaultName: string;
  private stmts: {
    get: Database.Statement;
    set: Database.Statement;
    delete: Database.Statement;
    keys: Database.Statement;
    clear: Database.Statement;
    putIndex: Database.Statement;
    getIndex: Database.Statement;
    clearIndex: Database.Statement;
  };

  constructor(options: SQLiteStorageOptions) {
    this.vaultName = options.vaultName;
    this.db = new Database(options.path);

    // Enable WAL mode for better concurrency
    this.db.pragma("journal_mode = WAL");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS device_state (
        vault_name TEXT NOT NULL,
        state_key TEXT NOT NULL,
        value TEXT NOT NULL,
        PRIMARY KEY (vault_name, state_key)
      );

      CREATE TABLE IF NOT EXISTS index_cache (
        vault_name TEXT PRIMARY KEY,
        content BLOB NOT NULL,
        sha TEXT NOT NULL,
        cached_at TEXT NOT NULL
      );
    `);

    this.stmts = {
      get: this.db.prepare(`
        SELECT value FROM device_state WHERE vault_name = ? AND state_key = ?
      `),
      set: this.db.prepare(`
        INSERT OR REPLACE INTO device_state (vault_name, state_key, value)
        VALUES (?, ?, ?)
      `),
      delete: this.db.prepare(`
        DELETE FROM device_state WHERE vault_name = ? AND state_key = ?
      `),
      keys: this.db.prepare(`
        SELECT state_key FROM device_state WHERE vault_name = ? ORDER BY state_key
      `),
      clear: this.db.prepare(`
        DELETE FROM device_state WHERE vault_name = ?
      `),
      putIndex: this.db.prepare(`
        INSERT OR REPLACE INTO index_cache (vault_name, content, sha, cached_at)
        VALUES (?, ?, ?, ?)
      `),
      getIndex: this.db.prepare(`
        SELECT content, sha, cached_at FROM index_cache WHERE vault_name = ?
      `),
      clearIndex: this.db.prepare(`
        DELETE FROM index_cache WHERE vault_name = ?
      `),
    };
  }

  get(key: string): string | undefined {
    const row = this.stmts.get.get(this.vaultName, key) as { value: string } | undefined;
    return row?.value;
  }

  set(key: string, value: string): void {
    this.stmts.set.run(this.vaultName, key, value);
  }

  delete(key: string): boolean {
    const result = this.stmts.delete.run(this.vaultName, key);
    return result.changes > 0;
  }

  keys(): string[] {
    const rows = this.stmts.keys.all(this.vaultName) as { state_key: string }[];
    return rows.map((row) => row.state_key);
  }

  /**
   * Clear device state and the cached index in one transaction
   */
  clear(): void {
    const transaction = this.db.transaction(() => {
      this.stmts.clear.run(this.vaultName);
      this.stmts.clearIndex.run(this.vaultName);
    });
    transaction();
  }

  cacheIndex(content: Uint8Array, sha: string, now: Date = new Date()): void {
    this.stmts.putIndex.run(this.vaultName, Buffer.from(content), sha, now.toISOString());
  }

  getCachedIndex(): CachedIndex | undefined {
    const row = this.stmts.getIndex.get(this.vaultName) as IndexRow | undefined;
    if (!row) {
      return undefined;
    }
    return { content: Buffer.from(row.content), sha: row.sha, cachedAt: new Date(row.cached_at) };
  }

  clearIndex(): void {
    this.stmts.clearIndex.run(this.vaultName);
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }
}
