/**
 * CLI Main Program
 *
 * Commander.js program setup for the fotoreport CLI.
 */

import { Command, Option } from 'commander';
import { VERSION } from '../version.js';

import { addDatabaseCommands } from './commands/database.js';
import { addClientCommand } from './commands/client.js';
import { addLocationCommand } from './commands/location.js';
import { addAssignmentCommand } from './commands/assignment.js';
import { addUserCommand } from './commands/user.js';
import { addReportCommand } from './commands/report.js';

/**
 * Create the Commander.js program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('fotoreport')
    .description('Field-visit photo reports: database setup and admin maintenance')
    .version(VERSION)
    .addOption(
      new Option('--format <format>', 'Output format').choices(['json', 'table']).default('json')
    );

  registerCommands(program);

  return program;
}

/**
 * Register all subcommands
 */
function registerCommands(program: Command): void {
  // Schema and migrations
  addDatabaseCommands(program);

  // Admin maintenance
  addClientCommand(program);
  addLocationCommand(program);
  addAssignmentCommand(program);
  addUserCommand(program);
  addReportCommand(program);
}

/**
 * Run the CLI program
 */
export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv, { from: 'user' });
}
