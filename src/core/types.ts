/**
 * Core/shared types used by the db layer and the CLI.
 */

import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import type Database from 'better-sqlite3';
import type { AppSchema } from '../db/schema.js';
import type { AppSchema as PgAppSchema } from '../db/schema/postgresql/index.js';

/**
 * Type-safe Drizzle database with full schema type information.
 *
 * SQLite is the authoritative backend; repositories are written against it.
 */
export type AppDb = BetterSQLite3Database<AppSchema>;

/**
 * PostgreSQL-specific Drizzle database type.
 * Used internally by PostgreSQLStorageAdapter.
 */
export type PostgreSQLAppDb = NodePgDatabase<PgAppSchema>;

/**
 * Database dependencies for repository factory functions.
 * Passed to repository factories instead of using a service locator.
 */
export interface DatabaseDeps {
  /** Drizzle ORM database instance with schema types */
  db: AppDb;
  /** Raw better-sqlite3 handle for transactions and raw SQL */
  sqlite: Database.Database;
}

export interface PaginationOptions {
  limit?: number;
  offset?: number;
}

/**
 * Inclusive range of visit dates, both 'YYYY-MM-DD'.
 */
export interface DateRange {
  from: string;
  to: string;
}
