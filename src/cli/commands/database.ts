/**
 * Database CLI Commands
 *
 * init, status and reset: migration management for either backend.
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { getCliConnection } from '../utils/context.js';
import { printOutput } from '../utils/output.js';
import { typedAction } from '../utils/typed-action.js';
import {
  initializeDatabase,
  initializePostgresDatabase,
  getMigrationStatus,
  getPostgresMigrationStatus,
  resetDatabase,
} from '../../db/init.js';
import { createMigrationError, createServiceUnavailableError } from '../../core/errors.js';

const initOptionsSchema = z.object({
  force: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

const resetOptionsSchema = z.object({
  yes: z.literal(true, {
    errorMap: () => ({ message: 'pass --yes to confirm deleting all data' }),
  }),
  verbose: z.boolean().default(false),
});

export function addDatabaseCommands(program: Command): void {
  program
    .command('init')
    .description('Create the schema or apply pending migrations')
    .option('--force', 'Re-run every migration, skipping objects that already exist')
    .option('--verbose', 'Log each migration')
    .action(
      typedAction(initOptionsSchema, async (options, globalOpts) => {
        const connection = await getCliConnection({ skipInit: true });

        const result =
          connection.type === 'sqlite'
            ? initializeDatabase(connection.sqlite, options)
            : await initializePostgresDatabase(connection.adapter, options);

        if (!result.success) {
          throw createMigrationError('init', result.errors.join(', '));
        }

        printOutput(result, globalOpts.format);
      })
    );

  program
    .command('status')
    .description('Show applied and pending migrations')
    .action(
      typedAction(z.object({}), async (_options, globalOpts) => {
        const connection = await getCliConnection({ skipInit: true });

        const status =
          connection.type === 'sqlite'
            ? getMigrationStatus(connection.sqlite)
            : await getPostgresMigrationStatus(connection.adapter);
        const health = await connection.adapter.healthCheck();

        printOutput({ dbType: connection.type, ...status, health }, globalOpts.format);
      })
    );

  program
    .command('reset')
    .description('Drop every table and re-create the schema (deletes all data)')
    .option('--yes', 'Confirm the reset')
    .option('--verbose', 'Log each migration')
    .action(
      typedAction(resetOptionsSchema, async (options, globalOpts) => {
        const connection = await getCliConnection({ skipInit: true });
        if (connection.type !== 'sqlite') {
          throw createServiceUnavailableError('reset', 'only the SQLite backend can be reset');
        }

        const result = resetDatabase(connection.sqlite, { verbose: options.verbose });
        if (!result.success) {
          throw createMigrationError('reset', result.errors.join(', '));
        }

        printOutput(result, globalOpts.format);
      })
    );
}
