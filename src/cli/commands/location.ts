/**
 * Location CLI Command
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { getCliRepositories } from '../utils/context.js';
import { printOutput } from '../utils/output.js';
import { typedAction, idSchema } from '../utils/typed-action.js';
import { createNotFoundError } from '../../core/errors.js';

const createOptionsSchema = z.object({
  clientId: idSchema,
  name: z.string(),
  code: z.string().optional(),
  address: z.string().optional(),
  city: z.string().optional(),
});

export function addLocationCommand(program: Command): void {
  const location = program.command('location').description('Manage client locations');

  location
    .command('create')
    .description('Create a location for a client')
    .requiredOption('--client-id <id>', 'Owning client id')
    .requiredOption('--name <name>', 'Location name')
    .option('--code <code>', 'Client-side location code')
    .option('--address <address>', 'Street address')
    .option('--city <city>', 'City')
    .action(
      typedAction(createOptionsSchema, async (options, globalOpts) => {
        const { repos } = await getCliRepositories();
        const created = repos.locations.create({
          clienteId: options.clientId,
          nombreLocal: options.name,
          codigoLocal: options.code,
          direccion: options.address,
          ciudad: options.city,
        });
        printOutput({ success: true, location: created }, globalOpts.format);
      })
    );

  location
    .command('list')
    .description('List active locations, or every location of one client')
    .option('--client-id <id>', 'Only this client (active and inactive)')
    .action(
      typedAction(z.object({ clientId: idSchema.optional() }), async (options, globalOpts) => {
        const { repos } = await getCliRepositories();
        const locations =
          options.clientId !== undefined
            ? repos.locations.listByClient(options.clientId, { limit: 100 })
            : repos.locations.listActive();
        printOutput({ locations, count: locations.length }, globalOpts.format);
      })
    );

  location
    .command('deactivate')
    .description('Soft-delete a location')
    .requiredOption('--id <id>', 'Location id')
    .action(
      typedAction(z.object({ id: idSchema }), async (options, globalOpts) => {
        const { repos } = await getCliRepositories();
        const updated = repos.locations.setActive(options.id, false);
        if (!updated) throw createNotFoundError('location', options.id);
        printOutput({ success: true, location: updated }, globalOpts.format);
      })
    );
}
