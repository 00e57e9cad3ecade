/**
 * Adapter Interfaces
 *
 * Abstract storage interface so the CLI and the migration runner can work
 * against SQLite or PostgreSQL without changing application code.
 *
 * Async-first for PostgreSQL compatibility. The SQLite adapter wraps
 * synchronous calls in resolved promises.
 */

/**
 * A row returned by a raw query, keyed by column name.
 */
export type RawRow = Record<string, unknown>;

export interface HealthCheckResult {
  ok: boolean;
  latencyMs: number;
}

/**
 * Abstract storage adapter interface.
 * Wraps database connections (SQLite, PostgreSQL).
 */
export interface IStorageAdapter {
  readonly dialect: 'sqlite' | 'postgresql';

  // Lifecycle
  connect(): Promise<void>;
  close(): Promise<void>;
  isConnected(): boolean;

  /**
   * Execute a raw SQL query and return all results.
   * @param sql - SQL with positional placeholders (`?` for SQLite, `$1` for PostgreSQL)
   * @param params - Query parameters (positional)
   */
  executeRaw<T extends RawRow = RawRow>(sql: string, params?: unknown[]): Promise<T[]>;

  /**
   * Execute a raw SQL query and return the first result, if any.
   */
  executeRawSingle<T extends RawRow = RawRow>(
    sql: string,
    params?: unknown[]
  ): Promise<T | undefined>;

  /**
   * Execute a function within a database transaction.
   * Commits on success, rolls back on error.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  // ORM instance access (Drizzle for both dialects)
  getDb(): unknown;

  // SQLite: Database.Database, PostgreSQL: Pool
  getRawConnection(): unknown;

  healthCheck(): Promise<HealthCheckResult>;
}
