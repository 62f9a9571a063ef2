/**
 * Run Command
 *
 * Loads a CSV file, runs the five normalization stages and saves the
 * canonical dataset as a table.
 *
 * @module cli/commands/run
 */

import { Command } from 'commander';
import * as path from 'node:path';
import { getBaseCommand, CliError, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { parseFormat, parseStopAfter, parseTableName, requireInputFile } from './options.js';
import {
  createStageProgress,
  formatErrorSummary,
  formatNullificationSummary,
  formatRunSummary,
  formatTimingBreakdown,
  createSpinner,
} from '../formatters/index.js';
import { config, loadGroupOverrides } from '../../config/index.js';
import { readCsvDataset } from '../../dataset/csv.js';
import type { Dataset } from '../../dataset/types.js';
import { createPipelineExecutor, type PipelineResult } from '../../pipeline/executor.js';
import { TOTAL_STAGES, type StageContext } from '../../pipeline/types.js';
import { NORMALIZATION_STAGES } from '../../stages/index.js';
import { exportCsv, generateRunId, saveTable } from '../../storage/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the run command.
 */
export interface RunOptions {
  /** Destination table */
  table?: string;
  /** Group override JSON file */
  overrides?: string;
  /** Write stage checkpoints and a manifest */
  checkpoints?: boolean;
  /** Stage number, name or ID to stop after */
  stopAfter?: string;
  /** List stages without running them */
  dryRun?: boolean;
  /** Also export the output to this CSV path */
  exportCsv?: string;
  /** Output format */
  format?: string;
}

/**
 * What a run produced.
 */
export interface RunOutcome {
  runId: string;
  result: PipelineResult;
  /** Table the output was saved to; absent on dry runs and early stops */
  tableName?: string;
  exportPath?: string;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the run command.
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run <csvFile>')
    .description('Normalize a CSV file and save it as a table')
    .option('-t, --table <name>', `Destination table (default: ${config.tableName})`)
    .option('-o, --overrides <file>', 'JSON file with extra vaccine group overrides')
    .option('-c, --checkpoints', 'Write every stage output and a run manifest')
    .option('--stop-after <stage>', 'Stop after this stage (1-5, name or ID); nothing is saved')
    .option('--dry-run', 'List the stages that would run without executing them')
    .option('--export-csv <path>', 'Also write the output to a CSV file')
    .option('-f, --format <type>', 'Output format: text, json', 'text')
    .action(async (csvFile: string, options: RunOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);

      try {
        await handleRun(csvFile, options, base);
      } catch (error) {
        base.fail(error);
      }
    });
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Handle the run command.
 *
 * @throws {CliError} On invalid options, a missing input file or a failed stage
 */
export async function handleRun(
  csvFile: string,
  options: RunOptions,
  base: BaseCommand
): Promise<RunOutcome> {
  const format = parseFormat(options.format);
  const stopAfter = parseStopAfter(options.stopAfter);
  const tableName = parseTableName(options.table ?? config.tableName);
  const source = await requireInputFile(csvFile);
  const showProgress = format === 'text' && !base.isQuiet();

  const groupOverrides = options.overrides
    ? await loadGroupOverrides(path.resolve(options.overrides))
    : undefined;

  const spinner = showProgress ? createSpinner(`Loading ${csvFile}...`) : null;
  let dataset: Dataset;
  try {
    dataset = await readCsvDataset(source);
  } catch (error) {
    spinner?.fail(`Could not load ${csvFile}`);
    throw error;
  }
  spinner?.succeed(`Loaded ${dataset.rows.length} rows, ${dataset.columns.length} columns`);

  const runId = generateRunId();
  const context: StageContext = {
    runId,
    dataDir: base.dataDir,
    options: { groupOverrides },
    source,
    logger: base.toLogger(),
  };
  base.debug(`Run ${runId}, data directory ${base.dataDir}`);

  const executor = createPipelineExecutor(NORMALIZATION_STAGES);
  const progress = showProgress && !options.dryRun ? createStageProgress() : null;
  if (progress) {
    const numberOf = (stageId: string) =>
      NORMALIZATION_STAGES.find((stage) => stage.id === stageId)?.number;
    executor.setCallbacks({
      onStageStart: (_stageId, stageNumber) => progress.startStage(stageNumber),
      onStageComplete: (stageId, result) => {
        const stageNumber = numberOf(stageId);
        if (stageNumber !== undefined) {
          progress.completeStage(stageNumber, result.timing.durationMs, result.stats);
        }
      },
      onStageError: (stageId, error) => {
        const stageNumber = numberOf(stageId);
        if (stageNumber !== undefined) {
          progress.failStage(stageNumber, error.message);
        }
      },
    });
  }

  const result = await executor.execute(context, dataset, {
    checkpoint: options.checkpoints,
    dryRun: options.dryRun,
    stopAfterStage: stopAfter,
  });

  if (progress && stopAfter !== undefined && result.success) {
    for (const stage of NORMALIZATION_STAGES) {
      if (stage.number > stopAfter) {
        progress.skipStage(stage.number);
      }
    }
  }

  const outcome: RunOutcome = { runId, result };

  const complete = result.success && !result.dryRun && result.stagesExecuted.length === TOTAL_STAGES;
  if (complete && result.output) {
    const tablePath = await saveTable(tableName, result.output, { runId, dataDir: base.dataDir });
    base.debug(`Table written to ${tablePath}`);
    outcome.tableName = tableName;
  }

  if (options.exportCsv && result.output && !result.dryRun) {
    outcome.exportPath = path.resolve(options.exportCsv);
    await exportCsv(result.output, outcome.exportPath);
  }

  if (format === 'json') {
    base.json({
      runId,
      source,
      success: result.success,
      dryRun: result.dryRun,
      stagesExecuted: result.stagesExecuted,
      finalStage: result.finalStage,
      rowCount: result.output?.rows.length ?? null,
      stats: result.stats,
      timing: result.timing,
      errors: result.errors,
      tableName: outcome.tableName ?? null,
      exportPath: outcome.exportPath ?? null,
      manifestPath: result.manifestPath ?? null,
    });
  } else {
    base.blank();
    base.info(
      formatRunSummary({
        runId,
        source: csvFile,
        result,
        tableName: outcome.tableName,
        exportPath: outcome.exportPath,
        manifestPath: result.manifestPath,
      })
    );

    const nullified = formatNullificationSummary(result.stats);
    if (nullified) {
      base.blank();
      base.info(nullified);
    }

    if (base.isVerbose() && !result.dryRun) {
      base.blank();
      base.info(formatTimingBreakdown(result.timing));
    }

    if (result.errors.length > 0) {
      base.blank();
      console.error(formatErrorSummary(result.errors));
    }
  }

  if (!result.success) {
    const failure = result.errors[0];
    throw new CliError(
      failure ? `Stage ${failure.stageId} failed: ${failure.error}` : 'Pipeline failed',
      EXIT_CODES.ERROR
    );
  }

  return outcome;
}

export default registerRunCommand;
