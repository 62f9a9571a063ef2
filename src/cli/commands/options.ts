/**
 * Shared Option Parsing
 *
 * Validation of option values shared by several commands. Invalid values
 * raise a CliError with the usage exit code.
 *
 * @module cli/commands/options
 */

import * as path from 'node:path';
import { CliError, EXIT_CODES } from '../base-command.js';
import { fileExists } from '../../storage/atomic.js';
import { TableNameSchema } from '../../schemas/table.js';
import { parseStageReference, type StageNumber } from '../../pipeline/types.js';

/**
 * Output formats accepted by `--format`.
 */
export type OutputFormat = 'text' | 'json';

export function parseFormat(value: string | undefined): OutputFormat {
  const format = value ?? 'text';
  if (format !== 'text' && format !== 'json') {
    throw new CliError(`Invalid format: "${format}". Use text or json.`, EXIT_CODES.USAGE_ERROR);
  }
  return format;
}

/**
 * Parse a `--stop-after` value: stage number, name or ID.
 */
export function parseStopAfter(value: string | undefined): StageNumber | undefined {
  if (value === undefined) {
    return undefined;
  }
  const stage = parseStageReference(value);
  if (stage === null) {
    throw new CliError(
      `Invalid stage: "${value}". Use a number 1-5, a stage name or a stage ID (e.g. 04_ci_split).`,
      EXIT_CODES.USAGE_ERROR
    );
  }
  return stage;
}

export function parseTableName(value: string): string {
  const result = TableNameSchema.safeParse(value);
  if (!result.success) {
    throw new CliError(
      `Invalid table name: "${value}". ${result.error.issues[0]?.message ?? ''}`.trim(),
      EXIT_CODES.USAGE_ERROR
    );
  }
  return result.data;
}

/**
 * Parse a positive integer option such as `--limit`.
 */
export function parsePositiveInt(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new CliError(`${name} must be a positive integer, got "${value}"`, EXIT_CODES.USAGE_ERROR);
  }
  return parsed;
}

/**
 * Resolve an input file, failing with NOT_FOUND if it does not exist.
 */
export async function requireInputFile(filePath: string): Promise<string> {
  const resolved = path.resolve(filePath);
  if (!(await fileExists(resolved))) {
    throw new CliError(`File not found: ${filePath}`, EXIT_CODES.NOT_FOUND);
  }
  return resolved;
}
