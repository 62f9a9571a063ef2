/**
 * Inspect Command
 *
 * Prints the schema, value counts, duplicate keys and coverage gaps of a
 * CSV file, either as loaded or after normalization.
 *
 * @module cli/commands/inspect
 */

import { Command } from 'commander';
import * as path from 'node:path';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { parseFormat, requireInputFile } from './options.js';
import { formatInspectionReport } from '../formatters/index.js';
import { loadGroupOverrides } from '../../config/index.js';
import { readCsvDataset } from '../../dataset/csv.js';
import {
  inspectDataset,
  type InspectionColumns,
  type InspectionReport,
} from '../../dataset/inspect.js';
import {
  runNormalization,
  YEAR_COLUMN,
  ZONE_COLUMN,
  VACCINE_COLUMN,
  VACCINE_GROUP_COLUMN,
} from '../../stages/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the inspect command.
 */
export interface InspectOptions {
  /** Normalize before inspecting */
  canonical?: boolean;
  /** Group override JSON file (with --canonical) */
  overrides?: string;
  /** Output format */
  format?: string;
}

/**
 * Column roles in a file as published. Before grouping, the vaccine name
 * is its own group.
 */
export const RAW_INSPECTION_COLUMNS: InspectionColumns = {
  period: 'Year',
  partition: 'Zone',
  category: 'Vaccine',
  group: 'Vaccine',
};

/** Column roles after normalization */
export const CANONICAL_INSPECTION_COLUMNS: InspectionColumns = {
  period: YEAR_COLUMN,
  partition: ZONE_COLUMN,
  category: VACCINE_COLUMN,
  group: VACCINE_GROUP_COLUMN,
};

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the inspect command.
 */
export function registerInspectCommand(program: Command): void {
  program
    .command('inspect <csvFile>')
    .description('Report schema, counts, duplicates and missing combinations of a CSV file')
    .option('--canonical', 'Normalize the file before inspecting it')
    .option('-o, --overrides <file>', 'JSON file with extra vaccine group overrides (with --canonical)')
    .option('-f, --format <type>', 'Output format: text, json', 'text')
    .action(async (csvFile: string, options: InspectOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);

      try {
        await handleInspect(csvFile, options, base);
      } catch (error) {
        base.fail(error);
      }
    });
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Handle the inspect command.
 */
export async function handleInspect(
  csvFile: string,
  options: InspectOptions,
  base: BaseCommand
): Promise<InspectionReport> {
  const format = parseFormat(options.format);
  const source = await requireInputFile(csvFile);

  let dataset = await readCsvDataset(source);
  let columns = RAW_INSPECTION_COLUMNS;

  if (options.canonical) {
    const groupOverrides = options.overrides
      ? await loadGroupOverrides(path.resolve(options.overrides))
      : undefined;
    const outcome = runNormalization(dataset, { groupOverrides });
    for (const [stageId, nullified] of Object.entries(outcome.nullified)) {
      for (const [column, count] of Object.entries(nullified)) {
        if (count > 0) {
          base.warn(`${stageId}: ${count} value(s) in "${column}" set to null`);
        }
      }
    }
    dataset = outcome.dataset;
    columns = CANONICAL_INSPECTION_COLUMNS;
  }

  base.debug(`Inspecting ${dataset.rows.length} rows from ${source}`);
  const report = inspectDataset(dataset, columns);

  if (format === 'json') {
    base.json(report);
  } else {
    base.info(
      formatInspectionReport(report, {
        period: columns.period,
        partition: columns.partition,
        category: columns.category,
        group: columns.group,
      })
    );
  }

  return report;
}

export default registerInspectCommand;
