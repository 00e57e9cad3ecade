/**
 * Database initialization and migration module
 *
 * Applies the SQL migrations under ./migrations (SQLite) and
 * ./migrations/postgresql, recording each applied file in _migrations.
 * Safe to call on every start: only pending files are applied.
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type Database from 'better-sqlite3';
import type { IStorageAdapter } from '../core/adapters/interfaces.js';
import { createMigrationError } from '../core/errors.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('init');

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface InitResult {
  success: boolean;
  alreadyInitialized: boolean;
  migrationsApplied: string[];
  errors: string[];
}

export interface MigrationStatus {
  initialized: boolean;
  appliedMigrations: string[];
  pendingMigrations: string[];
  totalMigrations: number;
}

export interface InitOptions {
  /** Re-run every migration, ignoring objects that already exist */
  force?: boolean;
  verbose?: boolean;
}

export interface MigrationFile {
  name: string;
  path: string;
}

export type MigrationDialect = 'sqlite' | 'postgresql';

/**
 * Locate the migrations directory for a dialect.
 * From src/db/ it sits beside this file; from dist/db/ it is read from src/.
 */
export function getMigrationsDir(dialect: MigrationDialect = 'sqlite'): string | undefined {
  const sub = dialect === 'postgresql' ? ['migrations', 'postgresql'] : ['migrations'];
  const possiblePaths = [
    resolve(__dirname, ...sub),
    resolve(__dirname, '../../src/db', ...sub),
  ];
  return possiblePaths.find((path) => existsSync(path));
}

/**
 * All migration files for a dialect, in file-name order (0000_, 0001_, ...).
 */
export function getMigrationFiles(dialect: MigrationDialect = 'sqlite'): MigrationFile[] {
  const migrationsDir = getMigrationsDir(dialect);
  if (!migrationsDir) {
    return [];
  }

  return readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort()
    .map((file) => ({ name: file, path: resolve(migrationsDir, file) }));
}

/**
 * Split a migration file on its `--> statement-breakpoint` markers,
 * dropping leading comment lines and empty statements.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];

  for (const rawStmt of sql.split(/-->\s*statement-breakpoint/i)) {
    const lines = rawStmt.trim().split('\n');
    const firstSql = lines.findIndex((line) => !line.trim().startsWith('--'));
    if (firstSql === -1) continue;

    const statement = lines.slice(firstSql).join('\n').trim();
    if (statement) {
      statements.push(statement);
    }
  }

  return statements;
}

// =============================================================================
// SQLITE
// =============================================================================

function ensureMigrationTable(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')) NOT NULL
    )
  `);
}

function getAppliedMigrations(sqlite: Database.Database): string[] {
  ensureMigrationTable(sqlite);
  return sqlite
    .prepare<[], { name: string }>('SELECT name FROM _migrations ORDER BY id')
    .all()
    .map((r) => r.name);
}

function listUserTables(sqlite: Database.Database): string[] {
  return sqlite
    .prepare<[], { name: string }>(
      `SELECT name FROM sqlite_master
       WHERE type = 'table' AND name NOT LIKE 'sqlite_%' AND name != '_migrations'`
    )
    .all()
    .map((r) => r.name);
}

/**
 * Errors a forced re-run may hit on objects created by an earlier run.
 */
function isAlreadyExistsError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return message.includes('already exists') || message.includes('duplicate column name');
}

function applyMigration(
  sqlite: Database.Database,
  migration: MigrationFile,
  options: InitOptions
): void {
  const statements = splitStatements(readFileSync(migration.path, 'utf-8'));

  statements.forEach((statement, index) => {
    try {
      sqlite.exec(statement);
    } catch (error) {
      if (options.force && isAlreadyExistsError(error)) {
        if (options.verbose) {
          logger.warn({ migration: migration.name, statement: index }, 'Skipping existing object');
        }
        return;
      }
      throw createMigrationError(
        migration.name,
        error instanceof Error ? error.message : String(error)
      );
    }
  });

  sqlite
    .prepare('INSERT INTO _migrations (name) VALUES (?) ON CONFLICT(name) DO NOTHING')
    .run(migration.name);
}

/**
 * Initialize the database with all pending migrations.
 *
 * Pending files are applied in one transaction; a failure leaves the
 * database as it was and is reported in `errors`.
 */
export function initializeDatabase(sqlite: Database.Database, options: InitOptions = {}): InitResult {
  const result: InitResult = {
    success: false,
    alreadyInitialized: false,
    migrationsApplied: [],
    errors: [],
  };

  try {
    const wasInitialized = listUserTables(sqlite).length > 0;
    const applied = new Set(getAppliedMigrations(sqlite));
    const migrationFiles = getMigrationFiles('sqlite');

    if (migrationFiles.length === 0) {
      result.errors.push('No migration files found in src/db/migrations/');
      return result;
    }

    const pending = options.force
      ? migrationFiles
      : migrationFiles.filter((m) => !applied.has(m.name));

    if (pending.length === 0) {
      if (options.verbose) {
        logger.info('Database already initialized, no pending migrations');
      }
      result.success = true;
      result.alreadyInitialized = wasInitialized;
      return result;
    }

    sqlite.transaction(() => {
      for (const migration of pending) {
        if (options.verbose) {
          logger.info({ migration: migration.name }, 'Applying migration');
        }
        applyMigration(sqlite, migration, options);
        result.migrationsApplied.push(migration.name);
      }
    })();

    result.success = true;

    if (options.verbose) {
      logger.info({ count: result.migrationsApplied.length }, 'Database initialized successfully');
    }
  } catch (error) {
    result.migrationsApplied = [];
    const message = error instanceof Error ? error.message : 'Unknown error';
    result.errors.push(message);
    logger.error({ error: message }, 'Database initialization failed');
  }

  return result;
}

/**
 * Get current migration status
 */
export function getMigrationStatus(sqlite: Database.Database): MigrationStatus {
  const initialized = listUserTables(sqlite).length > 0;
  const appliedMigrations = getAppliedMigrations(sqlite);
  const allMigrations = getMigrationFiles('sqlite').map((m) => m.name);

  return {
    initialized,
    appliedMigrations,
    pendingMigrations: allMigrations.filter((m) => !appliedMigrations.includes(m)),
    totalMigrations: allMigrations.length,
  };
}

/**
 * Reset database (drops all tables and re-initializes)
 * USE WITH CAUTION - This will delete all data!
 */
export function resetDatabase(sqlite: Database.Database, options: InitOptions = {}): InitResult {
  try {
    if (options.verbose) {
      logger.info('Resetting database...');
    }

    const tables = sqlite
      .prepare<[], { name: string }>(
        `SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%'`
      )
      .all();

    // Drop in any order
    sqlite.pragma('foreign_keys = OFF');
    try {
      for (const table of tables) {
        sqlite.exec(`DROP TABLE IF EXISTS "${table.name}"`);
      }
    } finally {
      sqlite.pragma('foreign_keys = ON');
    }

    return initializeDatabase(sqlite, { verbose: options.verbose });
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    return {
      success: false,
      alreadyInitialized: false,
      migrationsApplied: [],
      errors: [message],
    };
  }
}

// =============================================================================
// POSTGRESQL
// =============================================================================

async function ensurePostgresMigrationTable(adapter: IStorageAdapter): Promise<void> {
  await adapter.executeRaw(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ DEFAULT now() NOT NULL
    )
  `);
}

async function getAppliedPostgresMigrations(adapter: IStorageAdapter): Promise<string[]> {
  await ensurePostgresMigrationTable(adapter);
  const rows = await adapter.executeRaw<{ name: string }>('SELECT name FROM _migrations ORDER BY id');
  return rows.map((r) => r.name);
}

/**
 * Apply pending PostgreSQL migrations through the adapter, each file in
 * its own transaction.
 *
 * @throws DatabaseError (MIGRATION_ERROR) naming the file that failed
 */
export async function initializePostgresDatabase(
  adapter: IStorageAdapter,
  options: Pick<InitOptions, 'verbose'> = {}
): Promise<InitResult> {
  const applied = new Set(await getAppliedPostgresMigrations(adapter));
  const pending = getMigrationFiles('postgresql').filter((m) => !applied.has(m.name));

  const result: InitResult = {
    success: true,
    alreadyInitialized: applied.size > 0 && pending.length === 0,
    migrationsApplied: [],
    errors: [],
  };

  for (const migration of pending) {
    const statements = splitStatements(readFileSync(migration.path, 'utf-8'));

    try {
      await adapter.transaction(async () => {
        for (const statement of statements) {
          await adapter.executeRaw(statement);
        }
        await adapter.executeRaw('INSERT INTO _migrations (name) VALUES ($1)', [migration.name]);
      });
    } catch (error) {
      logger.error({ migration: migration.name, error }, 'PostgreSQL migration failed');
      throw createMigrationError(
        migration.name,
        error instanceof Error ? error.message : String(error)
      );
    }

    result.migrationsApplied.push(migration.name);
  }

  if (options.verbose && result.migrationsApplied.length > 0) {
    logger.info(
      { migrations: result.migrationsApplied, count: result.migrationsApplied.length },
      'Applied PostgreSQL migrations'
    );
  }

  return result;
}

/**
 * Get PostgreSQL migration status through the adapter
 */
export async function getPostgresMigrationStatus(adapter: IStorageAdapter): Promise<MigrationStatus> {
  const appliedMigrations = await getAppliedPostgresMigrations(adapter);
  const allMigrations = getMigrationFiles('postgresql').map((m) => m.name);

  return {
    initialized: appliedMigrations.length > 0,
    appliedMigrations,
    pendingMigrations: allMigrations.filter((m) => !appliedMigrations.includes(m)),
    totalMigrations: allMigrations.length,
  };
}
