/**
 * Base Command
 *
 * Shared state for every subcommand: the global flags, the resolved data
 * directory and the console helpers that honor `--quiet` and `--verbose`.
 * Handlers throw; the commander action hands the error to {@link BaseCommand.fail}.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { config } from '../config/index.js';
import { errorMessage } from '../errors/index.js';
import { resolveDataDir } from '../storage/paths.js';
import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options registered on the root program.
 */
export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** `false` when `--no-color` was given */
  color?: boolean;
  /** Overrides IMMUNIZATION_ETL_DATA_DIR */
  dataDir?: string;
}

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  /** Bad flags or arguments */
  USAGE_ERROR: 2,
  /** Missing input file or saved table */
  NOT_FOUND: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Failure that maps to a specific exit code. Any other error exits with
 * {@link EXIT_CODES.ERROR}.
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCode = EXIT_CODES.ERROR
  ) {
    super(message);
    this.name = 'CliError';
  }
}

// ============================================================================
// BaseCommand Class
// ============================================================================

export class BaseCommand {
  readonly options: GlobalOptions;

  /** Absolute directory holding `runs/` and `tables/` */
  readonly dataDir: string;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.dataDir = resolveDataDir(options.dataDir ?? config.dataDir);

    if (options.color === false || process.stdout.isTTY !== true) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  debug(message: string, ...args: unknown[]): void {
    if (this.isVerbose()) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.isQuiet()) {
      console.log(message, ...args);
    }
  }

  /** Printed even in quiet mode. */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Report an error and terminate. A {@link CliError} decides the exit code;
   * with `--verbose` the stack trace follows the message.
   */
  fail(error: unknown): never {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    if (this.isVerbose() && error instanceof Error && error.stack) {
      console.error(chalk.dim(error.stack));
    }
    process.exit(error instanceof CliError ? error.exitCode : EXIT_CODES.ERROR);
  }

  blank(): void {
    if (!this.isQuiet()) {
      console.log();
    }
  }

  /**
   * Bold title underlined with `=`, preceded by a blank line.
   */
  section(title: string): void {
    if (!this.isQuiet()) {
      console.log();
      console.log(chalk.bold(title));
      console.log(chalk.dim('='.repeat(title.length)));
    }
  }

  /** Machine-readable output, never suppressed. */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  keyValue(key: string, value: string | number): void {
    if (!this.isQuiet()) {
      console.log(`${chalk.dim(`${key}:`)} ${value}`);
    }
  }

  /**
   * Logger handed to pipeline stages. Its `error` prints but does not exit;
   * the executor decides whether the run goes on.
   */
  toLogger(): Logger {
    return {
      debug: (message, ...args) => this.debug(message, ...args),
      info: (message, ...args) => this.info(message, ...args),
      warn: (message, ...args) => this.warn(message, ...args),
      error: (message, ...args) => {
        console.error(chalk.red(`Error: ${message}`), ...args);
      },
    };
  }

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createBaseCommand(options: GlobalOptions): BaseCommand {
  return new BaseCommand(options);
}

/**
 * Find the BaseCommand the root program's preAction hook stored under
 * `_baseCommand`. Falls back to one built from defaults when the command
 * runs outside the full program, as in tests.
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> }): BaseCommand {
  const base = cmd.opts()['_baseCommand'];
  return base instanceof BaseCommand ? base : new BaseCommand({});
}
