/**
 * Assignment CLI Command
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { getCliRepositories } from '../utils/context.js';
import { printOutput } from '../utils/output.js';
import { typedAction, idSchema } from '../utils/typed-action.js';

export function addAssignmentCommand(program: Command): void {
  const assignment = program
    .command('assignment')
    .description('Manage which users cover which locations');

  assignment
    .command('create')
    .description('Assign a user to a location (no-op when already assigned)')
    .requiredOption('--user-id <id>', 'User id')
    .requiredOption('--location-id <id>', 'Location id')
    .action(
      typedAction(
        z.object({ userId: idSchema, locationId: idSchema }),
        async (options, globalOpts) => {
          const { repos } = await getCliRepositories();
          const stored = repos.assignments.ensure({
            usuarioId: options.userId,
            localId: options.locationId,
          });
          printOutput({ success: true, assignment: stored }, globalOpts.format);
        }
      )
    );

  assignment
    .command('list')
    .description('List assignments, or the locations a user may report on')
    .option('--user-id <id>', 'Only this user')
    .action(
      typedAction(z.object({ userId: idSchema.optional() }), async (options, globalOpts) => {
        const { repos } = await getCliRepositories();
        if (options.userId !== undefined) {
          const locations = repos.assignments.listAssignedLocations(options.userId);
          printOutput({ locations, count: locations.length }, globalOpts.format);
          return;
        }
        const assignments = repos.assignments.listDetailed({ limit: 100 });
        printOutput({ assignments, count: assignments.length }, globalOpts.format);
      })
    );
}
