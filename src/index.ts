// Main entry point for library usage.
// The CLI lives in ./cli.ts and loads .env itself; library callers set
// process.env before importing this module.

// Schema (both dialects)
export * from './db/schema.js';
export * as pgSchema from './db/schema/postgresql/index.js';

// Connections and migrations
export {
  createDatabase,
  createDatabaseConnection,
  closeDatabaseConnection,
  type DatabaseConnection,
  type SQLiteConnection,
  type PostgreSQLConnection,
} from './db/factory.js';
export {
  initializeDatabase,
  initializePostgresDatabase,
  getMigrationStatus,
  getPostgresMigrationStatus,
  resetDatabase,
  type InitResult,
  type InitOptions,
  type MigrationStatus,
} from './db/init.js';
export { transactionWithDb, transactionWithRetry, isDbHealthy } from './db/connection.js';

// Storage adapters
export * from './core/adapters/index.js';

// Repositories
export * from './db/repositories/index.js';
export { createRepositories } from './core/factory/repositories.js';
export type {
  Repositories,
  IUserRepository,
  IClientRepository,
  ILocationRepository,
  IAssignmentRepository,
  IReportRepository,
  IPhotoRepository,
} from './core/interfaces/repositories.js';
export type { AppDb, PostgreSQLAppDb, DatabaseDeps } from './core/types.js';
export {
  createReportWithPhotos,
  type BufferedPhoto,
  type SubmittedReport,
} from './services/report-submission.service.js';

// Errors
export * from './core/errors.js';
export * from './db/constraint-errors.js';
export { mapError, type MappedError } from './utils/error-mapper.js';

// Config and logging
export { config, buildConfig, reloadConfig, type Config, type DatabaseType } from './config/index.js';
export { logger, createComponentLogger } from './utils/logger.js';
