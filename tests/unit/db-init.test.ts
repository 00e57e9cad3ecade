/**
 * Unit tests for the migration runner
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { readFileSync } from 'node:fs';
import { getTableConfig } from 'drizzle-orm/sqlite-core';
import {
  splitStatements,
  getMigrationFiles,
  getMigrationsDir,
  initializeDatabase,
  getMigrationStatus,
  resetDatabase,
  initializePostgresDatabase,
  getPostgresMigrationStatus,
} from '../../src/db/init.js';
import { PostgreSQLStorageAdapter } from '../../src/core/adapters/postgresql.adapter.js';
import { DatabaseError } from '../../src/core/errors.js';
import { appSchema } from '../../src/db/schema.js';
import { pgState, resetPgMock, pgError, testPgConfig } from '../fixtures/pg-mock.js';

vi.mock('pg', async () => {
  const { MockPool } = await import('../fixtures/pg-mock.js');
  return { default: { Pool: MockPool } };
});

const APP_TABLES = ['asignaciones', 'clientes', 'fotos', 'locales', 'reportes', 'usuarios'];

function listTables(sqlite: Database.Database): string[] {
  return sqlite
    .prepare<[], { name: string }>(
      `SELECT name FROM sqlite_master
       WHERE type = 'table' AND name NOT LIKE 'sqlite_%' AND name != '_migrations'
       ORDER BY name`
    )
    .all()
    .map((r) => r.name);
}

describe('splitStatements', () => {
  it('should split on breakpoints and drop comments', () => {
    const sql = [
      '-- create a table',
      'CREATE TABLE a (x integer);',
      '--> statement-breakpoint',
      '',
      'CREATE INDEX i ON a (x);--> statement-breakpoint',
      '-- trailing comment only',
    ].join('\n');

    expect(splitStatements(sql)).toEqual(['CREATE TABLE a (x integer);', 'CREATE INDEX i ON a (x);']);
  });

  it('should return nothing for an empty file', () => {
    expect(splitStatements('   \n')).toEqual([]);
  });
});

describe('migration files', () => {
  it('should list the initial migration for both dialects', () => {
    expect(getMigrationFiles('sqlite').map((m) => m.name)).toEqual(['0000_initial.sql']);
    expect(getMigrationFiles('postgresql').map((m) => m.name)).toEqual(['0000_initial.sql']);
  });

  it('should keep PostgreSQL migrations in their own directory', () => {
    expect(getMigrationsDir('postgresql')).toBe(`${getMigrationsDir('sqlite')}/postgresql`);
  });
});

describe('SQLite migrations', () => {
  let sqlite: Database.Database;

  beforeEach(() => {
    sqlite = new Database(':memory:');
    sqlite.pragma('foreign_keys = ON');
  });

  afterEach(() => {
    sqlite.close();
  });

  it('should create every table on a fresh database', () => {
    const result = initializeDatabase(sqlite);

    expect(result).toEqual({
      success: true,
      alreadyInitialized: false,
      migrationsApplied: ['0000_initial.sql'],
      errors: [],
    });
    expect(listTables(sqlite)).toEqual(APP_TABLES);
  });

  it('should create the columns and indexes the table definitions declare', () => {
    initializeDatabase(sqlite);
    const columnsOf = sqlite.prepare<[string], { name: string }>(
      'SELECT name FROM pragma_table_info(?) ORDER BY cid'
    );
    const indexesOf = sqlite.prepare<[string], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = ?"
    );

    for (const table of Object.values(appSchema)) {
      const declared = getTableConfig(table);
      const columns = columnsOf.all(declared.name).map((row) => row.name);
      const indexes = indexesOf.all(declared.name).map((row) => row.name);

      expect(columns).toEqual(declared.columns.map((c) => c.name));
      expect(indexes).toEqual(expect.arrayContaining(declared.indexes.map((i) => i.config.name)));
    }
  });

  it('should apply nothing the second time', () => {
    initializeDatabase(sqlite);
    const result = initializeDatabase(sqlite);

    expect(result.success).toBe(true);
    expect(result.alreadyInitialized).toBe(true);
    expect(result.migrationsApplied).toEqual([]);
  });

  it('should report pending and applied migrations', () => {
    expect(getMigrationStatus(sqlite)).toEqual({
      initialized: false,
      appliedMigrations: [],
      pendingMigrations: ['0000_initial.sql'],
      totalMigrations: 1,
    });

    initializeDatabase(sqlite);

    expect(getMigrationStatus(sqlite)).toEqual({
      initialized: true,
      appliedMigrations: ['0000_initial.sql'],
      pendingMigrations: [],
      totalMigrations: 1,
    });
  });

  it('should re-run migrations with force without losing data', () => {
    initializeDatabase(sqlite);
    sqlite.prepare('INSERT INTO clientes (nombre) VALUES (?)').run('Acme');

    const result = initializeDatabase(sqlite, { force: true });

    expect(result.success).toBe(true);
    expect(result.migrationsApplied).toEqual(['0000_initial.sql']);
    const row = sqlite.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM clientes').get();
    expect(row?.n).toBe(1);
    const applied = sqlite.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM _migrations').get();
    expect(applied?.n).toBe(1);
  });

  it('should report a failing migration without applying any of it', () => {
    // A pre-existing table makes the first statement fail
    sqlite.exec('CREATE TABLE usuarios (id integer)');

    const result = initializeDatabase(sqlite);

    expect(result.success).toBe(false);
    expect(result.migrationsApplied).toEqual([]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toContain('Migration 0000_initial.sql failed:');
    expect(listTables(sqlite)).toEqual(['usuarios']);
    expect(getMigrationStatus(sqlite).appliedMigrations).toEqual([]);
  });

  it('should drop all data on reset and migrate again', () => {
    initializeDatabase(sqlite);
    sqlite.prepare('INSERT INTO clientes (nombre) VALUES (?)').run('Acme');

    const result = resetDatabase(sqlite);

    expect(result.success).toBe(true);
    expect(result.migrationsApplied).toEqual(['0000_initial.sql']);
    expect(listTables(sqlite)).toEqual(APP_TABLES);
    const row = sqlite.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM clientes').get();
    expect(row?.n).toBe(0);
    expect(sqlite.pragma('foreign_keys', { simple: true })).toBe(1);
  });
});

describe('PostgreSQL migrations', () => {
  let adapter: PostgreSQLStorageAdapter;
  let applied: string[];

  const migrationFile = getMigrationFiles('postgresql')[0];
  const statementCount = migrationFile
    ? splitStatements(readFileSync(migrationFile.path, 'utf-8')).length
    : 0;

  beforeEach(async () => {
    resetPgMock();
    applied = [];
    pgState.handler = (sql, params) => {
      if (sql.startsWith('SELECT name FROM _migrations')) {
        return { rows: applied.map((name) => ({ name })) };
      }
      if (sql.startsWith('INSERT INTO _migrations')) {
        applied.push(String(params?.[0]));
      }
      return { rows: [] };
    };
    adapter = new PostgreSQLStorageAdapter(testPgConfig, { maxRetries: 0 });
    await adapter.connect();
  });

  afterEach(async () => {
    await adapter.close();
  });

  it('should apply each pending file in a transaction and record it', async () => {
    const result = await initializePostgresDatabase(adapter);

    expect(result).toEqual({
      success: true,
      alreadyInitialized: false,
      migrationsApplied: ['0000_initial.sql'],
      errors: [],
    });
    expect(applied).toEqual(['0000_initial.sql']);

    const begin = pgState.queries.indexOf('BEGIN');
    const commit = pgState.queries.indexOf('COMMIT');
    expect(begin).toBeGreaterThan(-1);
    // statements plus the _migrations insert
    expect(commit - begin - 1).toBe(statementCount + 1);
    expect(pgState.queries[commit - 1]).toBe('INSERT INTO _migrations (name) VALUES ($1)');
  });

  it('should skip files already recorded', async () => {
    applied.push('0000_initial.sql');

    const result = await initializePostgresDatabase(adapter);

    expect(result.alreadyInitialized).toBe(true);
    expect(result.migrationsApplied).toEqual([]);
    expect(pgState.queries).not.toContain('BEGIN');
    expect(await getPostgresMigrationStatus(adapter)).toEqual({
      initialized: true,
      appliedMigrations: ['0000_initial.sql'],
      pendingMigrations: [],
      totalMigrations: 1,
    });
  });

  it('should roll back and name the file when a statement fails', async () => {
    pgState.handler = (sql) => {
      if (sql.includes('CREATE TABLE IF NOT EXISTS "clientes"')) {
        throw pgError('42P07', 'relation "clientes" already exists');
      }
      return { rows: [] };
    };

    const failure = initializePostgresDatabase(adapter);
    await expect(failure).rejects.toBeInstanceOf(DatabaseError);
    await expect(failure).rejects.toThrow(
      'Migration 0000_initial.sql failed: relation "clientes" already exists'
    );
    expect(pgState.queries).toContain('ROLLBACK');
    expect(pgState.queries).not.toContain('COMMIT');
  });
});
