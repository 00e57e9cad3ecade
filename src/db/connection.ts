/**
 * SQLite connection helpers
 *
 * - transactionWithDb() for synchronous transactions
 * - transactionWithRetry() for busy/locked contention
 * - isDbHealthy() for a cheap liveness probe
 */

import type Database from 'better-sqlite3';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('connection');

/**
 * Run a synchronous function inside a better-sqlite3 transaction.
 * Nested calls become savepoints.
 */
export function transactionWithDb<T>(sqlite: Database.Database, fn: () => T): T {
  return sqlite.transaction(fn)();
}

/**
 * Check if the database connection is healthy
 */
export function isDbHealthy(sqlite: Database.Database): boolean {
  if (!sqlite.open) {
    return false;
  }
  try {
    sqlite.prepare('SELECT 1').get();
    return true;
  } catch (error) {
    logger.warn({ error }, 'Database health check failed');
    return false;
  }
}

// =============================================================================
// TRANSACTION RETRY LOGIC
// =============================================================================

/**
 * Error codes and messages that indicate transient database contention.
 */
const RETRYABLE_ERROR_PATTERNS = [
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_PROTOCOL',
  'database is locked',
  'database is busy',
];

/**
 * Check if an error is retryable (transient database contention).
 * Constraint violations never are.
 */
export function isRetryableDbError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const message = error.message.toLowerCase();
  const code = 'code' in error ? String(error.code).toUpperCase() : '';

  return RETRYABLE_ERROR_PATTERNS.some(
    (pattern) => message.includes(pattern.toLowerCase()) || code.includes(pattern.toUpperCase())
  );
}

export interface TransactionRetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Initial delay in ms before first retry (default: 50) */
  initialDelayMs?: number;
  /** Maximum delay cap in ms (default: 1000) */
  maxDelayMs?: number;
  /** Backoff multiplier for exponential delay (default: 2) */
  backoffMultiplier?: number;
}

const DEFAULT_RETRY_OPTIONS: Required<TransactionRetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 50,
  maxDelayMs: 1000,
  backoffMultiplier: 2,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run a transaction with exponential backoff retry for SQLITE_BUSY and
 * SQLITE_LOCKED. Any other error is thrown on the first attempt.
 *
 * @throws The last error if all retries fail
 */
export async function transactionWithRetry<T>(
  sqlite: Database.Database,
  fn: () => T,
  options: TransactionRetryOptions = {}
): Promise<T> {
  const { maxRetries, initialDelayMs, maxDelayMs, backoffMultiplier } = {
    ...DEFAULT_RETRY_OPTIONS,
    ...options,
  };

  let lastError: Error | undefined;
  let delay = initialDelayMs;

  for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
    try {
      return sqlite.transaction(fn)();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      const isRetryable = isRetryableDbError(error);
      const hasMoreAttempts = attempt <= maxRetries;

      if (!isRetryable || !hasMoreAttempts) {
        logger.warn(
          { error: lastError.message, attempt, maxRetries: maxRetries + 1, retryable: isRetryable },
          'Transaction failed'
        );
        throw lastError;
      }

      logger.debug(
        { error: lastError.message, attempt, nextDelayMs: delay },
        'Retrying transaction after transient error'
      );

      await sleep(delay);
      delay = Math.min(delay * backoffMultiplier, maxDelayMs);
    }
  }

  throw lastError ?? new Error('Transaction failed with unknown error');
}
