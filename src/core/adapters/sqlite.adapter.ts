/**
 * SQLite Storage Adapter
 *
 * Wraps an open better-sqlite3 handle and its Drizzle instance behind the
 * IStorageAdapter interface.
 */

import type Database from 'better-sqlite3';
import type { AppDb } from '../types.js';
import type { IStorageAdapter, RawRow, HealthCheckResult } from './interfaces.js';

export class SQLiteStorageAdapter implements IStorageAdapter {
  readonly dialect = 'sqlite' as const;
  private db: AppDb;
  private sqlite: Database.Database;
  private connected = true; // Opened by the factory before construction

  constructor(db: AppDb, sqlite: Database.Database) {
    this.db = db;
    this.sqlite = sqlite;
  }

  async connect(): Promise<void> {
    // Interface compatibility: the factory already opened the file
    this.connected = this.sqlite.open;
  }

  async close(): Promise<void> {
    if (this.connected && this.sqlite.open) {
      this.sqlite.close();
    }
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected && this.sqlite.open;
  }

  async executeRaw<T extends RawRow = RawRow>(sql: string, params: unknown[] = []): Promise<T[]> {
    const stmt = this.sqlite.prepare<unknown[], T>(sql);
    // Statements that return no data (DDL, INSERT without RETURNING) cannot use all()
    if (!stmt.reader) {
      stmt.run(...params);
      return [];
    }
    return stmt.all(...params);
  }

  async executeRawSingle<T extends RawRow = RawRow>(
    sql: string,
    params: unknown[] = []
  ): Promise<T | undefined> {
    const stmt = this.sqlite.prepare<unknown[], T>(sql);
    if (!stmt.reader) {
      stmt.run(...params);
      return undefined;
    }
    return stmt.get(...params);
  }

  /**
   * Run fn inside BEGIN IMMEDIATE ... COMMIT.
   *
   * better-sqlite3 has a single connection, so every statement issued while
   * fn is pending belongs to this transaction. A call made while a
   * transaction is already open joins it.
   */
  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    if (this.sqlite.inTransaction) {
      return fn();
    }

    this.sqlite.exec('BEGIN IMMEDIATE');
    try {
      const result = await fn();
      this.sqlite.exec('COMMIT');
      return result;
    } catch (error) {
      if (this.sqlite.inTransaction) {
        this.sqlite.exec('ROLLBACK');
      }
      throw error;
    }
  }

  getDb(): AppDb {
    return this.db;
  }

  getRawConnection(): Database.Database {
    return this.sqlite;
  }

  async healthCheck(): Promise<HealthCheckResult> {
    const start = Date.now();
    try {
      if (!this.sqlite.open) {
        return { ok: false, latencyMs: Date.now() - start };
      }
      this.sqlite.prepare('SELECT 1').get();
      return { ok: true, latencyMs: Date.now() - start };
    } catch {
      return { ok: false, latencyMs: Date.now() - start };
    }
  }
}

/**
 * Create a SQLite storage adapter from existing db instances.
 */
export function createSQLiteStorageAdapter(db: AppDb, sqlite: Database.Database): SQLiteStorageAdapter {
  return new SQLiteStorageAdapter(db, sqlite);
}
