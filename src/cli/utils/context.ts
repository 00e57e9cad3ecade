/**
 * CLI Context Utilities
 *
 * Lazily opens the configured database for a CLI invocation and hands
 * out repositories. The connection is cached for the invocation and
 * closed by shutdownCliContext().
 */

import { config } from '../../config/index.js';
import {
  createDatabaseConnection,
  closeDatabaseConnection,
  type DatabaseConnection,
} from '../../db/factory.js';
import { createRepositories } from '../../core/factory/repositories.js';
import { createServiceUnavailableError } from '../../core/errors.js';
import type { DatabaseDeps } from '../../core/types.js';
import type { Repositories } from '../../core/interfaces/repositories.js';

let cachedConnection: DatabaseConnection | null = null;
// Supplied by the caller (tests, embedding programs); never closed here
let externalConnection: DatabaseConnection | null = null;

export interface CliContextOptions {
  /** Open without applying migrations (init, status and reset manage them) */
  skipInit?: boolean;
}

/**
 * Open (or reuse) the database connection for this invocation
 */
export async function getCliConnection(options: CliContextOptions = {}): Promise<DatabaseConnection> {
  if (externalConnection) return externalConnection;
  if (cachedConnection) return cachedConnection;

  const configuration = options.skipInit
    ? { ...config, database: { ...config.database, skipInit: true } }
    : config;

  cachedConnection = await createDatabaseConnection(configuration);
  return cachedConnection;
}

export interface CliDataContext {
  deps: DatabaseDeps;
  repos: Repositories;
}

/**
 * Repositories for data commands. These run on the SQLite backend only.
 */
export async function getCliRepositories(): Promise<CliDataContext> {
  const connection = await getCliConnection();
  if (connection.type !== 'sqlite') {
    throw createServiceUnavailableError(
      'Data commands',
      'only the SQLite backend is supported; use init or status for PostgreSQL'
    );
  }

  const deps: DatabaseDeps = { db: connection.db, sqlite: connection.sqlite };
  return { deps, repos: createRepositories(deps) };
}

/**
 * Run CLI commands against an already open connection.
 * Pass null to go back to opening one from config.
 */
export function useCliConnection(connection: DatabaseConnection | null): void {
  externalConnection = connection;
}

/**
 * Close the connection opened by getCliConnection()
 */
export async function shutdownCliContext(): Promise<void> {
  if (cachedConnection) {
    const connection = cachedConnection;
    cachedConnection = null;
    await closeDatabaseConnection(connection);
  }
}
