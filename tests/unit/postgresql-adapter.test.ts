/**
 * PostgreSQL Storage Adapter Unit Tests
 *
 * pg is replaced by the in-process pool from tests/fixtures/pg-mock.ts.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  PostgreSQLStorageAdapter,
  buildPoolConfig,
  isPgRetryableError,
} from '../../src/core/adapters/postgresql.adapter.js';
import { pgState, resetPgMock, pgError, testPgConfig as pgConfig } from '../fixtures/pg-mock.js';

vi.mock('pg', async () => {
  const { MockPool } = await import('../fixtures/pg-mock.js');
  return { default: { Pool: MockPool } };
});

describe('PostgreSQLStorageAdapter', () => {
  let adapter: PostgreSQLStorageAdapter;

  beforeEach(() => {
    resetPgMock();
    adapter = new PostgreSQLStorageAdapter(pgConfig, {
      maxRetries: 2,
      initialDelayMs: 1,
      maxDelayMs: 1,
    });
  });

  afterEach(async () => {
    await adapter.close();
  });

  describe('connect', () => {
    it('should verify the pool and set the statement timeout', async () => {
      await adapter.connect();

      expect(adapter.dialect).toBe('postgresql');
      expect(adapter.isConnected()).toBe(true);
      expect(pgState.pools).toHaveLength(1);
      expect(pgState.queries).toEqual(['SET statement_timeout = 5000', 'SELECT 1']);
      expect(adapter.getDb()).toBeDefined();
    });

    it('should pass the pool options built from config', async () => {
      await adapter.connect();
      expect(pgState.pools[0]?.options).toEqual(buildPoolConfig(pgConfig));
    });

    it('should be a no-op when already connected', async () => {
      await adapter.connect();
      await adapter.connect();
      expect(pgState.pools).toHaveLength(1);
    });

    it('should end the pool and rethrow when the server is unreachable', async () => {
      pgState.connectError = new Error('connect ECONNREFUSED 127.0.0.1:5432');

      await expect(adapter.connect()).rejects.toThrow('connect ECONNREFUSED 127.0.0.1:5432');
      expect(pgState.pools[0]?.ended).toBe(true);
      expect(adapter.isConnected()).toBe(false);
    });

    it('should refuse unverified SSL in production', async () => {
      const originalEnv = process.env.NODE_ENV;
      process.env.NODE_ENV = 'production';
      try {
        const insecure = new PostgreSQLStorageAdapter({
          ...pgConfig,
          ssl: true,
          sslRejectUnauthorized: false,
        });
        await expect(insecure.connect()).rejects.toThrow(
          'SSL certificate validation must be enabled in production'
        );
        expect(pgState.pools).toHaveLength(0);
      } finally {
        process.env.NODE_ENV = originalEnv;
      }
    });
  });

  describe('before connect', () => {
    it('should reject queries and transactions', async () => {
      await expect(adapter.executeRaw('SELECT 1')).rejects.toThrow(
        'PostgreSQL adapter is unavailable: not connected'
      );
      await expect(adapter.transaction(async () => 1)).rejects.toThrow('not connected');
      expect(() => adapter.getDb()).toThrow('not connected');
      expect(() => adapter.getRawConnection()).toThrow('not connected');
    });

    it('should report an unhealthy, empty pool', async () => {
      expect((await adapter.healthCheck()).ok).toBe(false);
      expect(adapter.getPoolStats()).toEqual({ totalCount: 0, idleCount: 0, waitingCount: 0 });
    });
  });

  describe('executeRaw', () => {
    it('should return the rows of the result', async () => {
      await adapter.connect();
      pgState.handler = (sql, params) =>
        sql.startsWith('SELECT nombre') ? { rows: [{ nombre: params?.[0] }] } : { rows: [] };

      const rows = await adapter.executeRaw<{ nombre: string }>(
        'SELECT nombre FROM clientes WHERE nombre = $1',
        ['Acme']
      );
      expect(rows).toEqual([{ nombre: 'Acme' }]);
      expect(
        await adapter.executeRawSingle('SELECT nombre FROM clientes WHERE nombre = $1', ['Acme'])
      ).toEqual({ nombre: 'Acme' });
    });
  });

  describe('transaction', () => {
    beforeEach(async () => {
      await adapter.connect();
      pgState.queries.length = 0;
    });

    it('should wrap fn in BEGIN and COMMIT', async () => {
      const result = await adapter.transaction(async () => {
        await adapter.executeRaw('INSERT INTO clientes (nombre) VALUES ($1)', ['Acme']);
        return 'ok';
      });

      expect(result).toBe('ok');
      expect(pgState.queries).toEqual([
        'SET statement_timeout = 5000',
        'BEGIN',
        'INSERT INTO clientes (nombre) VALUES ($1)',
        'COMMIT',
      ]);
    });

    it('should keep overlapping transactions on their own clients', async () => {
      let releaseFirst: () => void = () => undefined;
      const firstMayInsert = new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });

      // The first transaction inserts only after the second one has begun
      const first = adapter.transaction(async () => {
        await firstMayInsert;
        await adapter.executeRaw('INSERT A');
      });
      const second = adapter.transaction(async () => {
        await adapter.executeRaw('INSERT B');
        releaseFirst();
      });
      await Promise.all([first, second]);

      // Client 1 served the SELECT 1 check in connect()
      expect(pgState.clientQueries.filter((q) => q.startsWith('2:'))).toEqual([
        '2:SET statement_timeout = 5000',
        '2:BEGIN',
        '2:INSERT A',
        '2:COMMIT',
      ]);
      expect(pgState.clientQueries.filter((q) => q.startsWith('3:'))).toEqual([
        '3:SET statement_timeout = 5000',
        '3:BEGIN',
        '3:INSERT B',
        '3:COMMIT',
      ]);
    });

    it('should run executeRaw on the pool once the transaction is over', async () => {
      await adapter.transaction(async () => {
        await adapter.executeRaw('INSERT A');
      });
      pgState.clientQueries.length = 0;

      await adapter.executeRaw('SELECT nombre FROM clientes');

      expect(pgState.queries.at(-1)).toBe('SELECT nombre FROM clientes');
      expect(pgState.clientQueries).toEqual([]);
    });

    it('should retry a serialization failure', async () => {
      let attempts = 0;
      const fn = vi.fn(async () => {
        attempts++;
        if (attempts === 1) {
          throw pgError('40001', 'could not serialize access');
        }
        return attempts;
      });

      await expect(adapter.transaction(fn)).resolves.toBe(2);
      expect(fn).toHaveBeenCalledTimes(2);
      expect(pgState.queries.filter((q) => q === 'ROLLBACK')).toHaveLength(1);
      expect(pgState.queries.filter((q) => q === 'COMMIT')).toHaveLength(1);
    });

    it('should not retry an integrity violation', async () => {
      const violation = pgError('23505', 'duplicate key value violates unique constraint');
      const fn = vi.fn(async () => {
        throw violation;
      });

      await expect(adapter.transaction(fn)).rejects.toBe(violation);
      expect(fn).toHaveBeenCalledTimes(1);
      expect(pgState.queries).toContain('ROLLBACK');
      expect(pgState.queries).not.toContain('COMMIT');
    });

    it('should give up after the configured retries', async () => {
      const fn = vi.fn(async () => {
        throw pgError('40P01', 'deadlock detected');
      });

      await expect(adapter.transaction(fn)).rejects.toThrow('deadlock detected');
      expect(fn).toHaveBeenCalledTimes(3);
    });
  });

  describe('close', () => {
    it('should end the pool', async () => {
      await adapter.connect();
      expect(adapter.getPoolStats()).toEqual({ totalCount: 2, idleCount: 1, waitingCount: 0 });
      expect((await adapter.healthCheck()).ok).toBe(true);

      await adapter.close();
      expect(pgState.pools[0]?.ended).toBe(true);
      expect(adapter.isConnected()).toBe(false);
    });
  });
});

describe('buildPoolConfig', () => {
  it('should use discrete connection fields', () => {
    expect(buildPoolConfig(pgConfig)).toEqual({
      ssl: false,
      min: 0,
      max: 4,
      idleTimeoutMillis: 1000,
      connectionTimeoutMillis: 1000,
      host: 'localhost',
      port: 5432,
      database: 'fotoreport_test',
      user: 'tester',
      password: 'test-secret',
    });
  });

  it('should prefer a connection string', () => {
    const poolConfig = buildPoolConfig({
      ...pgConfig,
      connectionString: 'postgres://tester:test-secret@db:5432/fotoreport',
      ssl: true,
    });
    expect(poolConfig.connectionString).toBe('postgres://tester:test-secret@db:5432/fotoreport');
    expect(poolConfig.host).toBeUndefined();
    expect(poolConfig.ssl).toEqual({ rejectUnauthorized: true });
  });
});

describe('isPgRetryableError', () => {
  it('should accept transient SQLSTATEs', () => {
    expect(isPgRetryableError(pgError('40001', 'serialization'))).toBe(true);
    expect(isPgRetryableError(pgError('57P01', 'admin shutdown'))).toBe(true);
  });

  it('should accept lost connections by message', () => {
    expect(isPgRetryableError(new Error('Connection terminated unexpectedly'))).toBe(true);
  });

  it('should reject integrity violations and non-errors', () => {
    expect(isPgRetryableError(pgError('23503', 'foreign key'))).toBe(false);
    expect(isPgRetryableError('40001')).toBe(false);
  });
});
