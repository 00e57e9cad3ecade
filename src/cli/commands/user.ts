/**
 * User CLI Command
 *
 * Listing and deactivation only; credentials are never printed.
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { getCliRepositories } from '../utils/context.js';
import { printOutput } from '../utils/output.js';
import { typedAction, idSchema } from '../utils/typed-action.js';
import { createNotFoundError } from '../../core/errors.js';
import { USER_ROLES, type User } from '../../db/schema.js';

export type PublicUser = Omit<User, 'pwSalt' | 'pwHash'>;

export function toPublicUser(user: User): PublicUser {
  const { pwSalt: _salt, pwHash: _hash, ...rest } = user;
  return rest;
}

export function addUserCommand(program: Command): void {
  const user = program.command('user').description('Manage users');

  user
    .command('list')
    .description('List users ordered by role and login')
    .option('--role <role>', `Only this role (${USER_ROLES.join(', ')})`)
    .option('--all', 'Include inactive users')
    .action(
      typedAction(
        z.object({ role: z.enum(USER_ROLES).optional(), all: z.boolean().default(false) }),
        async (options, globalOpts) => {
          const { repos } = await getCliRepositories();
          const users = repos.users
            .list({ rol: options.role, activo: options.all ? undefined : true }, { limit: 100 })
            .map(toPublicUser);
          printOutput({ users, count: users.length }, globalOpts.format);
        }
      )
    );

  user
    .command('deactivate')
    .description('Soft-delete a user')
    .requiredOption('--id <id>', 'User id')
    .action(
      typedAction(z.object({ id: idSchema }), async (options, globalOpts) => {
        const { repos } = await getCliRepositories();
        const updated = repos.users.setActive(options.id, false);
        if (!updated) throw createNotFoundError('user', options.id);
        printOutput({ success: true, user: toPublicUser(updated) }, globalOpts.format);
      })
    );
}
