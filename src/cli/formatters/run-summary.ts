/**
 * Run Summary Formatters
 *
 * CLI output formatters for pipeline run summaries including:
 * - Standard run summary display
 * - Nullification warnings per stage
 * - Error summary formatting
 * - Per-stage timing breakdown
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import type { PipelineResult } from '../../pipeline/executor.js';
import type { StageStats } from '../../pipeline/types.js';
import { TOTAL_STAGES } from '../../pipeline/types.js';
import { formatDuration } from './progress.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Run summary data for formatting.
 */
export interface RunSummary {
  /** Run ID */
  runId: string;
  /** Input file */
  source: string;
  /** Pipeline execution result */
  result: PipelineResult;
  /** Table the output was saved to, if saved */
  tableName?: string;
  /** CSV export path, if exported */
  exportPath?: string;
  /** Run manifest path, if checkpoints were written */
  manifestPath?: string;
}

// ============================================================================
// Main Formatters
// ============================================================================

/**
 * Format a complete run summary.
 *
 * @example
 * ```
 * === Run Complete ===
 * Run:      20260115-143512
 * Source:   data/immunization.csv
 *
 * Pipeline: SUCCESS
 * Duration: 84ms
 * Stages:   5/5 completed
 * Rows:     120
 *
 * Table:    ns_school_immunization
 * ```
 */
export function formatRunSummary(summary: RunSummary): string {
  const lines: string[] = [];
  const { result } = summary;

  lines.push(chalk.bold(result.dryRun ? '=== Dry Run ===' : '=== Run Complete ==='));
  lines.push(`Run:      ${chalk.cyan(summary.runId)}`);
  lines.push(`Source:   ${summary.source}`);
  lines.push('');

  if (result.dryRun) {
    lines.push(`Would execute ${result.stagesExecuted.length}/${TOTAL_STAGES} stages:`);
    for (const stageId of result.stagesExecuted) {
      lines.push(`  - ${stageId}`);
    }
    return lines.join('\n');
  }

  const status = result.success ? chalk.green('SUCCESS') : chalk.red('FAILED');
  lines.push(`Pipeline: ${status}`);
  lines.push(`Duration: ${formatDuration(result.timing.durationMs)}`);
  lines.push(`Stages:   ${result.stagesExecuted.length}/${TOTAL_STAGES} completed`);
  if (result.output) {
    lines.push(`Rows:     ${result.output.rows.length}`);
  }

  const nullified = countNullified(result.stats);
  if (nullified > 0) {
    lines.push(chalk.yellow(`Nulls:    ${nullified} unparseable value(s) set to null`));
  }

  const destinations: string[] = [];
  if (summary.tableName) {
    destinations.push(`Table:    ${chalk.cyan(summary.tableName)}`);
  }
  if (summary.exportPath) {
    destinations.push(`CSV:      ${summary.exportPath}`);
  }
  if (summary.manifestPath) {
    destinations.push(`Manifest: ${summary.manifestPath}`);
  }
  if (destinations.length > 0) {
    lines.push('');
    lines.push(...destinations);
  }

  return lines.join('\n');
}

/**
 * Total nullified cells across stages.
 */
export function countNullified(stats: Record<string, StageStats>): number {
  let total = 0;
  for (const stage of Object.values(stats)) {
    for (const count of Object.values(stage.nullified)) {
      total += count;
    }
  }
  return total;
}

/**
 * Format nullified cells per stage and column.
 *
 * @returns Formatted lines, or an empty string when nothing was nullified
 */
export function formatNullificationSummary(stats: Record<string, StageStats>): string {
  const lines: string[] = [];

  for (const [stageId, stage] of Object.entries(stats)) {
    for (const [column, count] of Object.entries(stage.nullified)) {
      if (count > 0) {
        lines.push(`  ${chalk.yellow('!')} ${stageId} ${column}: ${count}`);
      }
    }
  }

  if (lines.length === 0) {
    return '';
  }
  return [chalk.bold(chalk.yellow('=== Nullified Values ===')), ...lines].join('\n');
}

/**
 * Format pipeline errors for display.
 */
export function formatErrorSummary(errors: Array<{ stageId: string; error: string }>): string {
  const lines: string[] = [];

  lines.push(chalk.bold.red('=== Errors ==='));
  lines.push('');

  for (const err of errors) {
    lines.push(`${chalk.red('✘')} ${err.stageId}${chalk.red(' (stopped)')}`);
    lines.push(`  ${chalk.dim(err.error)}`);
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Format per-stage timing breakdown.
 */
export function formatTimingBreakdown(
  timing: { perStage: Record<string, number>; durationMs: number }
): string {
  const lines: string[] = [];

  lines.push(chalk.bold('=== Timing Breakdown ==='));
  lines.push('');

  const stages = Object.entries(timing.perStage).sort(([a], [b]) => a.localeCompare(b));

  const maxDuration = Math.max(...Object.values(timing.perStage), 1);
  const barWidth = 30;
  const total = Math.max(timing.durationMs, 1);

  for (const [stageId, durationMs] of stages) {
    const percentage = Math.round((durationMs / total) * 100);
    const barLength = Math.round((durationMs / maxDuration) * barWidth);
    const bar = chalk.green('█'.repeat(barLength));

    lines.push(
      `${stageId.padEnd(26)} ${bar} ${formatDuration(durationMs).padStart(8)} (${percentage}%)`
    );
  }

  lines.push('');
  lines.push(`${'Total'.padEnd(26)} ${' '.repeat(barWidth)} ${formatDuration(timing.durationMs)}`);

  return lines.join('\n');
}

/**
 * Format a compact one-line run status.
 */
export function formatRunStatusLine(runId: string, success: boolean, durationMs: number): string {
  const status = success ? chalk.green('✔ SUCCESS') : chalk.red('✘ FAILED');
  return `${status} ${runId} (${formatDuration(durationMs)})`;
}
