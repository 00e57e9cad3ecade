/**
 * Client CLI Command
 *
 * Manage clients via CLI.
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { getCliRepositories } from '../utils/context.js';
import { printOutput } from '../utils/output.js';
import { typedAction, idSchema } from '../utils/typed-action.js';
import { createNotFoundError } from '../../core/errors.js';

const paginationShape = {
  limit: z.coerce.number().int().positive().optional(),
  offset: z.coerce.number().int().nonnegative().optional(),
};

export function addClientCommand(program: Command): void {
  const client = program.command('client').description('Manage clients');

  // client create
  client
    .command('create')
    .description('Create a client')
    .requiredOption('--name <name>', 'Client name (unique)')
    .action(
      typedAction(z.object({ name: z.string() }), async (options, globalOpts) => {
        const { repos } = await getCliRepositories();
        const created = repos.clients.create({ nombre: options.name });
        printOutput({ success: true, client: created }, globalOpts.format);
      })
    );

  // client list
  client
    .command('list')
    .description('List clients, active only unless --all')
    .option('--all', 'Include inactive clients')
    .option('--limit <n>', 'Maximum entries to return')
    .option('--offset <n>', 'Offset for pagination')
    .action(
      typedAction(
        z.object({ all: z.boolean().default(false), ...paginationShape }),
        async (options, globalOpts) => {
          const { repos } = await getCliRepositories();
          const clients = repos.clients.list(options.all ? {} : { activo: true }, {
            limit: options.limit,
            offset: options.offset,
          });
          printOutput({ clients, count: clients.length }, globalOpts.format);
        }
      )
    );

  // client rename
  client
    .command('rename')
    .description('Rename a client')
    .requiredOption('--id <id>', 'Client id')
    .requiredOption('--name <name>', 'New name')
    .action(
      typedAction(z.object({ id: idSchema, name: z.string() }), async (options, globalOpts) => {
        const { repos } = await getCliRepositories();
        const updated = repos.clients.rename(options.id, options.name);
        if (!updated) throw createNotFoundError('client', options.id);
        printOutput({ success: true, client: updated }, globalOpts.format);
      })
    );

  // client deactivate
  client
    .command('deactivate')
    .description('Soft-delete a client')
    .requiredOption('--id <id>', 'Client id')
    .action(
      typedAction(z.object({ id: idSchema }), async (options, globalOpts) => {
        const { repos } = await getCliRepositories();
        const updated = repos.clients.setActive(options.id, false);
        if (!updated) throw createNotFoundError('client', options.id);
        printOutput({ success: true, client: updated }, globalOpts.format);
      })
    );
}

