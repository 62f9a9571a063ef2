/**
 * Inspection Report Formatter
 *
 * @module cli/formatters/inspection
 */

import chalk from 'chalk';
import type { CellValue } from '../../dataset/types.js';
import type { InspectionReport, ValueCount } from '../../dataset/inspect.js';
import { formatCell } from './table.js';

function heading(title: string): string[] {
  return ['', chalk.bold(title), chalk.dim('='.repeat(title.length))];
}

function formatCounts(counts: ValueCount[]): string[] {
  const width = Math.max(0, ...counts.map((entry) => formatCell(entry.value).length));
  return counts.map((entry) => `  ${formatCell(entry.value).padEnd(width)}  ${entry.count}`);
}

function formatKey(values: CellValue[]): string {
  return values.map((value) => formatCell(value)).join(' | ');
}

/**
 * Render an inspection report as text.
 *
 * @param labels - Display names for the period, partition and category roles
 */
export function formatInspectionReport(
  report: InspectionReport,
  labels: { period: string; partition: string; category: string; group: string }
): string {
  const lines: string[] = [];

  lines.push(...heading('Schema'));
  for (const column of report.schema) {
    lines.push(`  ${column.name}: ${chalk.dim(column.type)}`);
  }
  lines.push(`  ${chalk.dim('rows:')} ${report.rowCount}`);

  lines.push(...heading(`Rows per ${labels.period}`));
  lines.push(...formatCounts(report.periodCounts));

  lines.push(...heading(`Rows per ${labels.partition}`));
  lines.push(...formatCounts(report.partitionCounts));

  lines.push(...heading(`Rows per ${labels.category}`));
  lines.push(...formatCounts(report.categoryCounts));

  lines.push(...heading(`Distinct values per ${labels.period}`));
  for (const entry of report.distinctPerPeriod) {
    const parts = Object.entries(entry.distinct).map(([column, count]) => `${column}=${count}`);
    lines.push(`  ${formatCell(entry.value)}  ${parts.join('  ')}`);
  }

  lines.push(...heading('Duplicate keys'));
  if (report.duplicateKeys.length === 0) {
    lines.push(chalk.green('  none'));
  }
  for (const entry of report.duplicateKeys) {
    lines.push(chalk.yellow(`  ${formatKey(entry.key)}  x${entry.count}`));
  }

  lines.push(...heading(`Missing ${labels.group} per ${labels.period}`));
  if (report.missingCombinations.length === 0) {
    lines.push(chalk.green('  none'));
  }
  for (const entry of report.missingCombinations) {
    lines.push(chalk.yellow(`  ${formatCell(entry.period)}: ${formatCell(entry.group)}`));
  }

  lines.push(...heading(`Missing ${labels.group} per ${labels.partition}`));
  if (report.missingGroupsByPartition.length === 0) {
    lines.push(chalk.green('  none'));
  }
  for (const entry of report.missingGroupsByPartition) {
    lines.push(
      chalk.yellow(
        `  ${formatCell(entry.period)} ${formatCell(entry.partition)}: ${entry.missing.map((value) => formatCell(value)).join(', ')}`
      )
    );
  }

  return lines.join('\n');
}
