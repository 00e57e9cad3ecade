/**
 * PostgreSQL Storage Adapter
 *
 * Implements IStorageAdapter for PostgreSQL using:
 * - pg (node-postgres) for connection pooling
 * - Drizzle ORM for type-safe queries
 */

import { AsyncLocalStorage } from 'async_hooks';
import type { Pool, PoolClient, PoolConfig } from 'pg';
import type { IStorageAdapter, RawRow, HealthCheckResult } from './interfaces.js';
import type { Config } from '../../config/index.js';
import type { PostgreSQLAppDb } from '../types.js';
import { createComponentLogger } from '../../utils/logger.js';
import { createValidationError, createServiceUnavailableError } from '../errors.js';

const logger = createComponentLogger('pg-adapter');

/**
 * SQLSTATEs that indicate transient issues worth retrying.
 * Integrity violations (class 23) are never in this list.
 * See: https://www.postgresql.org/docs/current/errcodes-appendix.html
 */
export const PG_RETRYABLE_ERROR_CODES = [
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '57P01', // admin_shutdown
  '08006', // connection_failure
  '08000', // connection_exception
  '08003', // connection_does_not_exist
  '53300', // too_many_connections
  '55P03', // lock_not_available
];

export interface PgRetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

const DEFAULT_PG_RETRY_CONFIG: PgRetryConfig = {
  maxRetries: 3,
  initialDelayMs: 50,
  maxDelayMs: 1000,
  backoffMultiplier: 2,
};

function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && error.code !== undefined) {
    return String(error.code);
  }
  return undefined;
}

/**
 * Check if a PostgreSQL error is retryable.
 */
export function isPgRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const code = getErrorCode(error);
  if (code !== undefined && PG_RETRYABLE_ERROR_CODES.includes(code)) {
    return true;
  }

  const message = error.message.toLowerCase();
  return (
    message.includes('connection terminated') ||
    message.includes('connection refused') ||
    message.includes('could not connect')
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Build pg pool options from the postgresql config section.
 * A connection string, when present, takes precedence over host/port/user.
 */
export function buildPoolConfig(config: Config['postgresql']): PoolConfig {
  const base: PoolConfig = {
    ssl: config.ssl ? { rejectUnauthorized: config.sslRejectUnauthorized } : false,
    min: config.poolMin,
    max: config.poolMax,
    idleTimeoutMillis: config.idleTimeoutMs,
    connectionTimeoutMillis: config.connectionTimeoutMs,
  };

  if (config.connectionString) {
    return { ...base, connectionString: config.connectionString };
  }

  return {
    ...base,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
  };
}

/**
 * PostgreSQL storage adapter implementation.
 * Uses pg-pool for connection pooling and Drizzle ORM for queries.
 */
export class PostgreSQLStorageAdapter implements IStorageAdapter {
  readonly dialect = 'postgresql' as const;
  private pool: Pool | null = null;
  private db: PostgreSQLAppDb | null = null;
  private config: Config['postgresql'];
  private retryConfig: PgRetryConfig;
  private connected = false;
  // Client of the transaction running in the current async context
  private readonly transactionScope = new AsyncLocalStorage<PoolClient>();

  constructor(config: Config['postgresql'], retryConfig: Partial<PgRetryConfig> = {}) {
    this.config = config;
    this.retryConfig = { ...DEFAULT_PG_RETRY_CONFIG, ...retryConfig };
  }

  /**
   * Connect to PostgreSQL and verify the pool with SELECT 1.
   */
  async connect(): Promise<void> {
    if (this.connected && this.pool) {
      return;
    }

    const isProduction = process.env.NODE_ENV === 'production';
    if (isProduction && this.config.ssl && !this.config.sslRejectUnauthorized) {
      throw createValidationError(
        'sslRejectUnauthorized',
        'SSL certificate validation must be enabled in production',
        'Set FOTOREPORT_PG_SSL_REJECT_UNAUTHORIZED=true or disable production mode'
      );
    }

    if (!isProduction && this.config.ssl && !this.config.sslRejectUnauthorized) {
      logger.warn(
        { ssl: true, sslRejectUnauthorized: false, environment: process.env.NODE_ENV ?? 'development' },
        'SSL certificate validation is disabled; use only in development'
      );
    }

    // Dynamic import to avoid loading pg when using SQLite
    const { default: pg } = await import('pg');
    const { drizzle } = await import('drizzle-orm/node-postgres');
    const { appSchema } = await import('../../db/schema/postgresql/index.js');

    const pool = new pg.Pool(buildPoolConfig(this.config));

    const statementTimeoutMs = this.config.statementTimeoutMs;
    if (statementTimeoutMs > 0) {
      pool.on('connect', (client: PoolClient) => {
        client.query(`SET statement_timeout = ${statementTimeoutMs}`).catch((error: unknown) => {
          logger.warn({ error }, 'Failed to set statement_timeout');
        });
      });
    }

    let client: PoolClient | null = null;
    try {
      client = await pool.connect();
      await client.query('SELECT 1');
    } catch (error) {
      try {
        await pool.end();
      } catch (closeError) {
        logger.warn({ closeError }, 'Failed to close pool after connection error');
      }
      throw error;
    } finally {
      client?.release();
    }

    this.pool = pool;
    this.db = drizzle(pool, { schema: appSchema });
    this.connected = true;
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this.db = null;
    }
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected && this.pool !== null;
  }

  /**
   * Execute a raw SQL query and return all rows.
   * Inside transaction() the client of that transaction is used, also
   * when other transactions overlap with it.
   */
  async executeRaw<T extends RawRow = RawRow>(sql: string, params?: unknown[]): Promise<T[]> {
    if (!this.pool) {
      throw createServiceUnavailableError('PostgreSQL adapter', 'not connected');
    }
    const client = this.transactionScope.getStore();
    const result = client
      ? await client.query<T>(sql, params)
      : await this.pool.query<T>(sql, params);
    return result.rows;
  }

  async executeRawSingle<T extends RawRow = RawRow>(
    sql: string,
    params?: unknown[]
  ): Promise<T | undefined> {
    const results = await this.executeRaw<T>(sql, params);
    return results[0];
  }

  /**
   * Execute fn within BEGIN/COMMIT on a dedicated pool client.
   * Rolls back on error and retries transient failures (deadlock,
   * serialization failure, lost connection) with exponential backoff.
   */
  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const pool = this.pool;
    if (!pool) {
      throw createServiceUnavailableError('PostgreSQL adapter', 'not connected');
    }

    const { maxRetries, initialDelayMs, maxDelayMs, backoffMultiplier } = this.retryConfig;
    let lastError: Error | undefined;
    let delay = initialDelayMs;

    for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
      const client = await pool.connect();

      try {
        await client.query('BEGIN');
        const result = await this.transactionScope.run(client, fn);
        await client.query('COMMIT');
        return result;
      } catch (error) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          logger.debug({ rollbackError }, 'Rollback failed');
        }

        lastError = error instanceof Error ? error : new Error(String(error));
        const isRetryable = isPgRetryableError(error);
        const hasMoreAttempts = attempt <= maxRetries;

        if (!isRetryable || !hasMoreAttempts) {
          logger.warn(
            {
              error: lastError.message,
              code: getErrorCode(error),
              attempt,
              maxRetries: maxRetries + 1,
              retryable: isRetryable,
            },
            'PostgreSQL transaction failed'
          );
          throw lastError;
        }

        logger.debug(
          { error: lastError.message, code: getErrorCode(error), attempt, nextDelayMs: delay },
          'Retrying PostgreSQL transaction after transient error'
        );

        await sleep(delay);
        delay = Math.min(delay * backoffMultiplier, maxDelayMs);
      } finally {
        client.release();
      }
    }

    throw lastError ?? new Error('Transaction failed with unknown error');
  }

  getDb(): PostgreSQLAppDb {
    if (!this.db) {
      throw createServiceUnavailableError('PostgreSQL adapter', 'not connected');
    }
    return this.db;
  }

  getRawConnection(): Pool {
    if (!this.pool) {
      throw createServiceUnavailableError('PostgreSQL adapter', 'not connected');
    }
    return this.pool;
  }

  async healthCheck(): Promise<HealthCheckResult> {
    const start = Date.now();
    try {
      if (!this.pool) {
        return { ok: false, latencyMs: Date.now() - start };
      }
      await this.pool.query('SELECT 1');
      return { ok: true, latencyMs: Date.now() - start };
    } catch {
      return { ok: false, latencyMs: Date.now() - start };
    }
  }

  /**
   * Get pool statistics for monitoring.
   */
  getPoolStats(): { totalCount: number; idleCount: number; waitingCount: number } {
    if (!this.pool) {
      return { totalCount: 0, idleCount: 0, waitingCount: 0 };
    }
    return {
      totalCount: this.pool.totalCount,
      idleCount: this.pool.idleCount,
      waitingCount: this.pool.waitingCount,
    };
  }
}

/**
 * Create a PostgreSQL storage adapter from configuration.
 */
export function createPostgreSQLStorageAdapter(
  config: Config['postgresql'],
  retryConfig?: Partial<PgRetryConfig>
): PostgreSQLStorageAdapter {
  return new PostgreSQLStorageAdapter(config, retryConfig);
}
