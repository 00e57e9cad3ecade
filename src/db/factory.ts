import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { appSchema } from './schema.js';
import { initializeDatabase, initializePostgresDatabase } from './init.js';
import { createComponentLogger } from '../utils/logger.js';
import { ConnectionError, createMigrationError } from '../core/errors.js';
import type { Config } from '../config/index.js';
import type { DatabaseDeps } from '../core/types.js';
import { SQLiteStorageAdapter } from '../core/adapters/sqlite.adapter.js';
import type { PostgreSQLStorageAdapter } from '../core/adapters/postgresql.adapter.js';

const logger = createComponentLogger('db-factory');

/**
 * SQLite database connection result
 */
export interface SQLiteConnection extends DatabaseDeps {
  type: 'sqlite';
  adapter: SQLiteStorageAdapter;
}

/**
 * PostgreSQL database connection result
 */
export interface PostgreSQLConnection {
  type: 'postgresql';
  adapter: PostgreSQLStorageAdapter;
}

/**
 * Discriminated union of database connections
 */
export type DatabaseConnection = SQLiteConnection | PostgreSQLConnection;

function isInMemory(path: string): boolean {
  return path === ':memory:' || path.startsWith('file::memory:');
}

/**
 * Open the SQLite database described by the config.
 *
 * Creates the parent directory, enables WAL, foreign keys and the busy
 * timeout, and applies pending migrations unless `database.skipInit` is set.
 *
 * @throws ConnectionError when the file cannot be opened
 * @throws DatabaseError (MIGRATION_ERROR) when a migration fails
 */
export function createDatabase(configuration: Config): DatabaseDeps {
  const dbPath = configuration.database.path;

  if (!isInMemory(dbPath)) {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  let sqlite: Database.Database;
  try {
    sqlite = new Database(dbPath, { timeout: configuration.database.busyTimeoutMs });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConnectionError(`Failed to open SQLite database: ${message}`, false, { dbPath });
  }

  // WAL for concurrent readers alongside the single writer
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma(`busy_timeout = ${configuration.database.busyTimeoutMs}`);

  if (!configuration.database.skipInit) {
    const result = initializeDatabase(sqlite, { verbose: configuration.database.verbose });

    if (!result.success) {
      sqlite.close();
      throw createMigrationError('sqlite', result.errors.join(', '));
    }

    if (result.migrationsApplied.length > 0) {
      logger.info(
        { migrations: result.migrationsApplied, count: result.migrationsApplied.length },
        'Applied migrations'
      );
    }
  }

  const db = drizzle(sqlite, { schema: appSchema });
  return { db, sqlite };
}

/**
 * Factory to create a new database connection based on configuration.
 * Returns a discriminated union based on dbType.
 */
export async function createDatabaseConnection(configuration: Config): Promise<DatabaseConnection> {
  if (configuration.dbType === 'postgresql') {
    return createPostgreSQLConnection(configuration);
  }
  const { db, sqlite } = createDatabase(configuration);
  return { type: 'sqlite', db, sqlite, adapter: new SQLiteStorageAdapter(db, sqlite) };
}

/**
 * Create a PostgreSQL connection and run its migrations unless skipped
 */
async function createPostgreSQLConnection(configuration: Config): Promise<PostgreSQLConnection> {
  // Dynamic import to avoid loading pg when using SQLite
  const { PostgreSQLStorageAdapter } = await import('../core/adapters/postgresql.adapter.js');

  const adapter = new PostgreSQLStorageAdapter(configuration.postgresql);
  await adapter.connect();

  if (!configuration.database.skipInit) {
    try {
      await initializePostgresDatabase(adapter, { verbose: configuration.database.verbose });
    } catch (error) {
      await adapter.close();
      throw error;
    }
  }

  logger.info(
    { host: configuration.postgresql.host, database: configuration.postgresql.database },
    'Connected to PostgreSQL'
  );

  return { type: 'postgresql', adapter };
}

/**
 * Close whichever connection the factory produced
 */
export async function closeDatabaseConnection(connection: DatabaseConnection): Promise<void> {
  await connection.adapter.close();
}
