/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - run: Normalize a CSV file into a table
 * - inspect: Report on a CSV file, raw or normalized
 * - table: List and show saved tables
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerRunCommand } from './run.js';
import { registerInspectCommand } from './inspect.js';
import { registerTableCommands } from './table.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerInspectCommand(program);
  registerTableCommands(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'run <csvFile>', description: 'Normalize a CSV file and save it as a table' },
    { name: 'inspect <csvFile>', description: 'Report on a CSV file, raw or normalized' },
    { name: 'table list', description: 'List saved tables' },
    { name: 'table show <name>', description: 'Print the rows of a saved table' },
  ];
}
