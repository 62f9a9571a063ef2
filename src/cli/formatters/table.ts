/**
 * Table Formatters
 *
 * Fixed-width text rendering of datasets for the terminal.
 *
 * @module cli/formatters/table
 */

import chalk from 'chalk';
import type { CellValue, ColumnType, Dataset } from '../../dataset/types.js';
import { parseDecimalType } from '../../dataset/types.js';
import { formatDecimal } from '../../casts/numeric.js';

/** Widest a column may grow before values are truncated */
const MAX_COLUMN_WIDTH = 32;

/**
 * Truncate a string to a maximum length.
 */
export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}

/**
 * Pad a string to a fixed width, ignoring ANSI colour codes.
 */
export function padRight(str: string, width: number): string {
  const visibleLength = str.replace(/\x1b\[[0-9;]*m/g, '').length;
  const padding = Math.max(0, width - visibleLength);
  return str + ' '.repeat(padding);
}

/**
 * Render one cell. Decimals keep their scale, nulls print as `null`.
 *
 * @example formatCell(82, 'decimal(4,1)') // '82.0'
 */
export function formatCell(value: CellValue, type: ColumnType = 'unknown'): string {
  if (value === null) {
    return 'null';
  }
  const decimal = parseDecimalType(type);
  if (decimal && typeof value === 'number') {
    return formatDecimal(value, decimal.scale);
  }
  return String(value);
}

/**
 * Render the first `limit` rows of a dataset as a fixed-width table.
 */
export function formatTable(dataset: Dataset, limit: number = dataset.rows.length): string {
  const rows = dataset.rows.slice(0, limit);
  const cells = rows.map((row) =>
    dataset.columns.map((column) => truncate(formatCell(row[column.name] ?? null, column.type), MAX_COLUMN_WIDTH))
  );
  const widths = dataset.columns.map((column, index) =>
    Math.max(
      Math.min(column.name.length, MAX_COLUMN_WIDTH),
      ...cells.map((line) => line[index].length)
    )
  );

  const lines: string[] = [];
  lines.push(
    chalk.bold(
      dataset.columns
        .map((column, index) => padRight(truncate(column.name, MAX_COLUMN_WIDTH), widths[index] + 2))
        .join('')
        .trimEnd()
    )
  );
  lines.push(chalk.dim('-'.repeat(widths.reduce((sum, width) => sum + width + 2, 0))));

  for (const line of cells) {
    lines.push(
      line
        .map((value, index) => {
          const padded = padRight(value, widths[index] + 2);
          return value === 'null' ? chalk.dim(padded) : padded;
        })
        .join('')
        .trimEnd()
    );
  }

  return lines.join('\n');
}
