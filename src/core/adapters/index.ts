/**
 * Storage adapter exports
 */

export type { IStorageAdapter, RawRow, HealthCheckResult } from './interfaces.js';

export { SQLiteStorageAdapter, createSQLiteStorageAdapter } from './sqlite.adapter.js';
export {
  PostgreSQLStorageAdapter,
  createPostgreSQLStorageAdapter,
  buildPoolConfig,
  isPgRetryableError,
  PG_RETRYABLE_ERROR_CODES,
  type PgRetryConfig,
} from './postgresql.adapter.js';
