/**
 * Table Commands
 *
 * - table list: names of saved tables
 * - table show: rows of one table
 *
 * @module cli/commands/table
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getBaseCommand, CliError, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { parseFormat, parsePositiveInt, parseTableName } from './options.js';
import { formatTable } from '../formatters/index.js';
import { listTables, loadTable, tableExists } from '../../storage/index.js';
import type { TableFile } from '../../schemas/table.js';

// ============================================================================
// Types
// ============================================================================

export interface ListTablesOptions {
  /** Output format */
  format?: string;
}

export interface ShowTableOptions {
  /** Maximum rows to print */
  limit?: string;
  /** Output format */
  format?: string;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the table command and its subcommands.
 */
export function registerTableCommands(program: Command): void {
  const tableCmd = program.command('table').description('Inspect saved tables');

  tableCmd
    .command('list')
    .description('List saved tables')
    .option('-f, --format <type>', 'Output format: text, json', 'text')
    .action(async (options: ListTablesOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent?.parent ?? cmd);
      try {
        await handleListTables(options, base);
      } catch (error) {
        base.fail(error);
      }
    });

  tableCmd
    .command('show <name>')
    .description('Print the rows of a saved table')
    .option('-n, --limit <count>', 'Maximum number of rows to show', '20')
    .option('-f, --format <type>', 'Output format: text, json', 'text')
    .action(async (name: string, options: ShowTableOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent?.parent ?? cmd);
      try {
        await handleShowTable(name, options, base);
      } catch (error) {
        base.fail(error);
      }
    });
}

// ============================================================================
// Handlers
// ============================================================================

/**
 * Handle `table list`.
 */
export async function handleListTables(
  options: ListTablesOptions,
  base: BaseCommand
): Promise<string[]> {
  const format = parseFormat(options.format);
  const tables = await listTables(base.dataDir);

  if (format === 'json') {
    base.json(tables);
    return tables;
  }

  if (tables.length === 0) {
    base.info('No tables found.');
    base.blank();
    base.info('Create one with: immunization-etl run <csvFile>');
    return tables;
  }

  base.section('Tables');
  for (const table of tables) {
    base.info(`  ${table}`);
  }
  base.blank();
  base.info(`Total: ${tables.length} table${tables.length === 1 ? '' : 's'}`);
  return tables;
}

/**
 * Handle `table show <name>`.
 *
 * @throws {CliError} NOT_FOUND when the table does not exist
 */
export async function handleShowTable(
  name: string,
  options: ShowTableOptions,
  base: BaseCommand
): Promise<TableFile> {
  const format = parseFormat(options.format);
  const tableName = parseTableName(name);
  const limit = parsePositiveInt(options.limit ?? '20', '--limit');

  if (!(await tableExists(tableName, base.dataDir))) {
    throw new CliError(`Table not found: ${tableName}`, EXIT_CODES.NOT_FOUND);
  }

  const table = await loadTable(tableName, base.dataDir);

  if (format === 'json') {
    base.json({ ...table, rows: table.rows.slice(0, limit) });
    return table;
  }

  base.section(`Table: ${table.tableName}`);
  base.keyValue('Saved', table.savedAt);
  if (table.runId) {
    base.keyValue('Run', table.runId);
  }
  base.keyValue('Rows', table.rowCount);
  base.blank();
  base.info(formatTable(table, limit));

  if (table.rowCount > limit) {
    base.blank();
    base.info(chalk.dim(`Showing ${limit} of ${table.rowCount} rows (use --limit to show more)`));
  }

  return table;
}
