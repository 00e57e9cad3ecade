/**
 * Report CLI Command
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { getCliRepositories } from '../utils/context.js';
import { printOutput } from '../utils/output.js';
import { typedAction, idSchema, dateSchema } from '../utils/typed-action.js';

const listOptionsSchema = z
  .object({
    userId: idSchema.optional(),
    clientId: idSchema.optional(),
    from: dateSchema,
    to: dateSchema,
  })
  .refine((o) => o.userId === undefined || o.clientId === undefined, {
    message: 'use either --user-id or --client-id, not both',
    path: ['clientId'],
  });

export function addReportCommand(program: Command): void {
  const report = program.command('report').description('Query visit reports');

  report
    .command('list')
    .description('List reports in a visit-date range')
    .option('--user-id <id>', "One user's reports, newest first")
    .option('--client-id <id>', "One client's reports, oldest first")
    .requiredOption('--from <date>', 'First visit date (YYYY-MM-DD)')
    .requiredOption('--to <date>', 'Last visit date (YYYY-MM-DD)')
    .action(
      typedAction(listOptionsSchema, async (options, globalOpts) => {
        const { repos } = await getCliRepositories();
        const range = { from: options.from, to: options.to };

        const reports =
          options.userId !== undefined
            ? repos.reports.listForUser(options.userId, range)
            : options.clientId !== undefined
              ? repos.reports.listForClient(options.clientId, range)
              : repos.reports.listInRange(range);

        printOutput({ reports, count: reports.length }, globalOpts.format);
      })
    );
}
