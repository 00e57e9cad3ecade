/**
 * CLI Integration Tests
 *
 * Runs the commander program in process against an in-memory database
 * handed to the CLI with useCliConnection().
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import {
  setupTestDb,
  cleanupTestDb,
  createTestUser,
  seedSite,
  type TestDb,
} from '../../fixtures/test-helpers.js';
import { runCli } from '../../../src/cli/index.js';
import { useCliConnection } from '../../../src/cli/utils/context.js';
import { SQLiteStorageAdapter } from '../../../src/core/adapters/sqlite.adapter.js';
import { PostgreSQLStorageAdapter } from '../../../src/core/adapters/postgresql.adapter.js';
import { testPgConfig } from '../../fixtures/pg-mock.js';

describe('CLI commands', () => {
  let testDb: TestDb;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    testDb = setupTestDb();
    useCliConnection({
      type: 'sqlite',
      db: testDb.db,
      sqlite: testDb.sqlite,
      adapter: new SQLiteStorageAdapter(testDb.db, testDb.sqlite),
    });
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    useCliConnection(null);
    cleanupTestDb(testDb);
  });

  /** Run a command and parse the JSON it printed */
  async function run(...argv: string[]): Promise<unknown> {
    logSpy.mockClear();
    await runCli(argv);
    return JSON.parse(String(logSpy.mock.calls.at(-1)?.[0]));
  }

  /** Run a command expected to fail and parse the JSON error body */
  async function runFailing(...argv: string[]): Promise<unknown> {
    errorSpy.mockClear();
    await expect(runCli(argv)).rejects.toThrow('process.exit(1)');
    return JSON.parse(String(errorSpy.mock.calls.at(-1)?.[0]));
  }

  describe('database', () => {
    it('init should report an up-to-date schema', async () => {
      expect(await run('init')).toEqual({
        success: true,
        alreadyInitialized: true,
        migrationsApplied: [],
        errors: [],
      });
    });

    it('status should report migrations and health', async () => {
      expect(await run('status')).toMatchObject({
        dbType: 'sqlite',
        initialized: true,
        appliedMigrations: ['0000_initial.sql'],
        pendingMigrations: [],
        totalMigrations: 1,
        health: { ok: true },
      });
    });

    it('reset should require --yes', async () => {
      expect(await runFailing('reset')).toEqual({
        error: 'Validation error: yes - pass --yes to confirm deleting all data',
        code: 'E1000',
        details: { field: 'yes' },
      });
    });

    it('reset --yes should empty every table', async () => {
      seedSite(testDb.repos);

      expect(await run('reset', '--yes')).toMatchObject({
        success: true,
        migrationsApplied: ['0000_initial.sql'],
      });
      expect(testDb.repos.clients.list()).toEqual([]);
    });
  });

  describe('client', () => {
    it('should create and list clients', async () => {
      expect(await run('client', 'create', '--name', ' Acme ')).toMatchObject({
        success: true,
        client: { id: 1, nombre: 'Acme', activo: true },
      });
      await run('client', 'create', '--name', 'Beta');
      await run('client', 'deactivate', '--id', '2');

      expect(await run('client', 'list')).toMatchObject({ clients: [{ nombre: 'Acme' }], count: 1 });
      expect(await run('client', 'list', '--all')).toMatchObject({ count: 2 });
    });

    it('should report a duplicate name as ALREADY_EXISTS', async () => {
      await run('client', 'create', '--name', 'Acme');

      expect(await runFailing('client', 'create', '--name', 'Acme')).toEqual({
        error: 'UNIQUE constraint failed: clientes.nombre',
        code: 'E2001',
        details: { kind: 'unique', table: 'clientes', columns: ['nombre'] },
      });
    });

    it('should rename and report unknown ids', async () => {
      await run('client', 'create', '--name', 'Acme');

      expect(await run('client', 'rename', '--id', '1', '--name', 'Acme Corp')).toMatchObject({
        client: { nombre: 'Acme Corp' },
      });
      expect(await runFailing('client', 'rename', '--id', '9', '--name', 'X')).toMatchObject({
        error: 'client not found: 9',
        code: 'E2000',
      });
    });

    it('should render a table with --format table', async () => {
      await run('client', 'create', '--name', 'Acme');
      logSpy.mockClear();

      await runCli(['--format', 'table', 'client', 'list']);

      const output = String(logSpy.mock.calls.at(-1)?.[0]);
      expect(output.split('\n').slice(0, 3)).toEqual([
        'Count: 1',
        '',
        'id | nombre | activo | creadoEn                ',
      ]);
    });
  });

  describe('location', () => {
    it('should create a location for a client', async () => {
      await run('client', 'create', '--name', 'Acme');

      expect(
        await run('location', 'create', '--client-id', '1', '--name', 'Centro', '--city', 'Lima')
      ).toMatchObject({
        success: true,
        location: { clienteId: 1, nombreLocal: 'Centro', ciudad: 'Lima', codigoLocal: null },
      });
      expect(await run('location', 'list')).toMatchObject({
        locations: [{ cliente: 'Acme', nombreLocal: 'Centro' }],
        count: 1,
      });
    });

    it('should report an unknown client as REFERENCE_NOT_FOUND', async () => {
      expect(
        await runFailing('location', 'create', '--client-id', '42', '--name', 'Ghost')
      ).toMatchObject({ code: 'E2002', details: { kind: 'foreign_key' } });
    });

    it('should validate numeric ids', async () => {
      expect(
        await runFailing('location', 'create', '--client-id', 'abc', '--name', 'Ghost')
      ).toMatchObject({ code: 'E1000', details: { field: 'clientId' } });
    });
  });

  describe('assignment', () => {
    it('should assign once and list the user locations', async () => {
      const user = createTestUser(testDb.repos, 'ana');
      await run('client', 'create', '--name', 'Acme');
      await run('location', 'create', '--client-id', '1', '--name', 'Centro');

      const first = await run('assignment', 'create', '--user-id', String(user.id), '--location-id', '1');
      const second = await run('assignment', 'create', '--user-id', String(user.id), '--location-id', '1');

      expect(second).toEqual(first);
      expect(await run('assignment', 'list', '--user-id', String(user.id))).toMatchObject({
        locations: [{ id: 1, cliente: 'Acme', nombreLocal: 'Centro' }],
        count: 1,
      });
      expect(await run('assignment', 'list')).toMatchObject({
        assignments: [{ usuario: 'ana', cliente: 'Acme', nombreLocal: 'Centro', activo: true }],
        count: 1,
      });
    });
  });

  describe('user', () => {
    it('should list users without credentials', async () => {
      createTestUser(testDb.repos, 'root', 'admin');
      createTestUser(testDb.repos, 'ana', 'worker');

      const result = await run('user', 'list');

      expect(result).toMatchObject({
        users: [{ usuario: 'root', rol: 'admin' }, { usuario: 'ana', rol: 'worker' }],
        count: 2,
      });
      expect(JSON.stringify(result)).not.toContain('pwHash');
    });

    it('should filter by role and hide deactivated users', async () => {
      createTestUser(testDb.repos, 'root', 'admin');
      const ana = createTestUser(testDb.repos, 'ana', 'worker');
      await run('user', 'deactivate', '--id', String(ana.id));

      expect(await run('user', 'list')).toMatchObject({ count: 1 });
      expect(await run('user', 'list', '--role', 'worker', '--all')).toMatchObject({
        users: [{ usuario: 'ana', activo: false }],
        count: 1,
      });
    });
  });

  describe('report', () => {
    it('should list reports in a range', async () => {
      const { user, client, location } = seedSite(testDb.repos);
      testDb.repos.reports.create({ localId: location.id, usuarioId: user.id, fechaVisita: '2024-06-01' });
      testDb.repos.reports.create({ localId: location.id, usuarioId: user.id, fechaVisita: '2024-07-01' });

      expect(
        await run('report', 'list', '--from', '2024-06-01', '--to', '2024-06-30')
      ).toMatchObject({ reports: [{ fechaVisita: '2024-06-01', cliente: 'Acme' }], count: 1 });
      expect(
        await run('report', 'list', '--client-id', String(client.id), '--from', '2024-01-01', '--to', '2024-12-31')
      ).toMatchObject({ reports: [{ fechaVisita: '2024-06-01' }, { fechaVisita: '2024-07-01' }] });
      expect(
        await run('report', 'list', '--user-id', String(user.id), '--from', '2024-01-01', '--to', '2024-12-31')
      ).toMatchObject({ reports: [{ fechaVisita: '2024-07-01' }, { fechaVisita: '2024-06-01' }] });
    });

    it('should refuse both --user-id and --client-id', async () => {
      expect(
        await runFailing(
          'report', 'list', '--user-id', '1', '--client-id', '1', '--from', '2024-01-01', '--to', '2024-01-31'
        )
      ).toMatchObject({
        error: 'Validation error: clientId - use either --user-id or --client-id, not both',
        code: 'E1000',
      });
    });

    it('should reject a malformed date', async () => {
      expect(
        await runFailing('report', 'list', '--from', '2024-1-1', '--to', '2024-01-31')
      ).toMatchObject({ error: 'Validation error: from - expected YYYY-MM-DD', code: 'E1000' });
    });
  });

  describe('on PostgreSQL', () => {
    beforeEach(() => {
      // Never connected: both commands refuse before touching the adapter
      useCliConnection({ type: 'postgresql', adapter: new PostgreSQLStorageAdapter(testPgConfig) });
    });

    it('should refuse data commands', async () => {
      expect(await runFailing('client', 'list')).toEqual({
        error:
          'Data commands is unavailable: only the SQLite backend is supported; use init or status for PostgreSQL',
        code: 'E5002',
        details: {
          service: 'Data commands',
          suggestion: 'Check Data commands configuration and dependencies',
        },
      });
    });

    it('should refuse reset', async () => {
      expect(await runFailing('reset', '--yes')).toMatchObject({
        error: 'reset is unavailable: only the SQLite backend can be reset',
        code: 'E5002',
      });
    });
  });
});
