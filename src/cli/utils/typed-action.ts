/**
 * Type-safe action wrapper for Commander.js
 *
 * Commander hands actions loosely typed option bags. Each command declares
 * a zod schema for its options; the wrapper validates them, runs the
 * handler, closes the CLI context, and reports failures.
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { createValidationError } from '../../core/errors.js';
import { shutdownCliContext } from './context.js';
import { handleCliError } from './errors.js';

/**
 * Global CLI options available to all commands via --option flags
 */
export const globalOptionsSchema = z.object({
  format: z.enum(['json', 'table']).default('json'),
});

export type GlobalOptions = z.infer<typeof globalOptionsSchema>;

/**
 * Positive integer id given as a CLI string
 */
export const idSchema = z.coerce.number().int().positive();

/**
 * Calendar date option, YYYY-MM-DD
 */
export const dateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'options';
    throw createValidationError(field, issue?.message ?? 'invalid value');
  }
  return result.data;
}

/**
 * Wrap a typed handler as a Commander action.
 *
 * @example
 * client
 *   .command('create')
 *   .requiredOption('--name <name>')
 *   .action(typedAction(z.object({ name: z.string() }), async (options, globalOpts) => {
 *     ...
 *   }));
 */
export function typedAction<S extends z.ZodTypeAny>(
  schema: S,
  handler: (options: z.infer<S>, globalOpts: GlobalOptions) => Promise<void>
): (options: unknown, cmd: Command) => Promise<void> {
  return async (options: unknown, cmd: Command) => {
    try {
      const globalOpts = parseWith(globalOptionsSchema, cmd.optsWithGlobals());
      await handler(parseWith(schema, options), globalOpts);
      await shutdownCliContext();
    } catch (error) {
      await shutdownCliContext();
      handleCliError(error);
    }
  };
}
