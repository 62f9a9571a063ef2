/**
 * Dataset Type Definitions
 *
 * In-memory tabular dataset passed between the loader, the normalization
 * stages and the table sink. A dataset is an ordered list of named columns
 * plus rows keyed by column name.
 *
 * @module dataset/types
 */

// ============================================================================
// Cells and Rows
// ============================================================================

/**
 * A single cell value. Absent or unparseable values are always `null`,
 * never `undefined`.
 */
export type CellValue = string | number | boolean | null;

/**
 * One dataset row keyed by column name.
 */
export type Row = Readonly<Record<string, CellValue>>;

// ============================================================================
// Columns
// ============================================================================

/**
 * Fixed-point decimal type tag, e.g. `decimal(4,1)`.
 */
export type DecimalType = `decimal(${number},${number})`;

/**
 * Declared column type.
 *
 * Loaded columns are `unknown`: the loader types individual cells but never
 * infers a column type. Stages declare the type of the columns they write.
 */
export type ColumnType = 'unknown' | 'string' | 'integer' | DecimalType;

/**
 * Column definition.
 */
export interface Column {
  /** Column name */
  readonly name: string;
  /** Declared type */
  readonly type: ColumnType;
}

// ============================================================================
// Dataset
// ============================================================================

/**
 * Immutable tabular dataset.
 */
export interface Dataset {
  /** Ordered column definitions */
  readonly columns: readonly Column[];
  /** Rows; every row carries a value (possibly null) for every column */
  readonly rows: readonly Row[];
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Build a decimal type tag.
 *
 * @example decimalType(4, 1) // 'decimal(4,1)'
 */
export function decimalType(precision: number, scale: number): DecimalType {
  return `decimal(${precision},${scale})`;
}

/**
 * Parse a decimal type tag into precision and scale.
 *
 * @returns Precision and scale, or null if the type is not a decimal
 */
export function parseDecimalType(
  type: ColumnType
): { precision: number; scale: number } | null {
  const match = /^decimal\((\d+),(\d+)\)$/.exec(type);
  if (!match) {
    return null;
  }
  return { precision: parseInt(match[1], 10), scale: parseInt(match[2], 10) };
}

/**
 * Check whether a dataset has a column.
 */
export function hasColumn(dataset: Dataset, name: string): boolean {
  return dataset.columns.some((column) => column.name === name);
}

/**
 * Create a dataset from column names and plain row objects.
 *
 * Every column is declared `unknown`. Missing or `undefined` cells become null
 * and keys that are not listed columns are dropped.
 *
 * @example
 * ```typescript
 * const dataset = createDataset(['Year', 'Zone'], [{ Year: 2018, Zone: 'Central' }]);
 * ```
 */
export function createDataset(
  names: readonly string[],
  rows: ReadonlyArray<Readonly<Record<string, CellValue | undefined>>>
): Dataset {
  return {
    columns: names.map((name) => ({ name, type: 'unknown' as const })),
    rows: rows.map((row) => {
      const normalized: Record<string, CellValue> = {};
      for (const name of names) {
        normalized[name] = row[name] ?? null;
      }
      return normalized;
    }),
  };
}
