#!/usr/bin/env node
/**
 * Immunization ETL CLI
 *
 * Main entry point for the immunization-etl tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   immunization-etl --help
 *   immunization-etl run data/immunization.csv --checkpoints
 *   immunization-etl inspect data/immunization.csv --canonical
 *   immunization-etl table show ns_school_immunization --limit 10
 *
 * @module cli
 */

import { Command } from 'commander';
import { PROGRAM_NAME, VERSION } from './version.js';
import { BaseCommand, CliError, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';
import { errorMessage } from '../errors/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 *
 * @returns Configured commander Program instance
 */
export function createProgram(): Command {
  const program = new Command();

  // Program metadata
  program
    .name(PROGRAM_NAME)
    .description('Normalize school immunization coverage data into an analysis-ready table')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override default data directory (~/.immunization-etl)');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const raw = thisCommand.opts();
    const opts: GlobalOptions = {
      verbose: raw.verbose === true,
      quiet: raw.quiet === true,
      color: raw.color !== false,
      dataDir: typeof raw.dataDir === 'string' ? raw.dataDir : undefined,
    };
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      baseCommand.fail(new CliError('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR));
    }
  });

  // Global error handling
  program.exitOverride((err) => {
    if (
      err.code === 'commander.helpDisplayed' ||
      err.code === 'commander.version' ||
      err.code === 'commander.help'
    ) {
      process.exit(EXIT_CODES.SUCCESS);
    }
    process.exit(EXIT_CODES.USAGE_ERROR);
  });

  // Register all subcommands (after exitOverride so they inherit it)
  registerCommands(program);

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(EXIT_CODES.ERROR);
  }
}

// Run if executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(EXIT_CODES.ERROR);
  });
}
