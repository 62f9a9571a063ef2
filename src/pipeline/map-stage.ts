/**
 * Map Stage
 *
 * Generic whole-dataset transforms the normalization stages are built from.
 * A map stage is a list of column mappings, each pairing a target column with
 * a pure row-to-value function, plus the columns to drop afterwards.
 *
 * Every mapping of a stage reads the stage's *input* row, never the output of
 * a sibling mapping, so two columns derived from the same source see the
 * same original value. Dropped columns are removed only after all mappings
 * have been applied.
 *
 * @module pipeline/map-stage
 */

import type { CellValue, Column, ColumnType, Dataset, Row } from '../dataset/types.js';
import { SchemaMismatchError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Pure function deriving one cell from a row. Returns null when the value
 * cannot be derived.
 */
export type ValueFunction<T extends CellValue = CellValue> = (row: Row) => T | null;

/**
 * A single column mapping within a map stage.
 *
 * @typeParam T - Non-null value type written to the target column
 */
export interface ColumnMapping<T extends CellValue = CellValue> {
  /** Column the derived value is written to (replaced if it exists, appended otherwise) */
  target: string;
  /** Declared type of the target column */
  type: ColumnType;
  /** Columns the function reads; all must exist in the input */
  sources: readonly string[];
  /** Derivation function */
  derive: ValueFunction<T>;
}

/**
 * Map stage definition.
 */
export interface MapStagePlan {
  /** Mappings applied to every row */
  mappings: readonly ColumnMapping[];
  /** Columns removed after all mappings have been applied */
  drop?: readonly string[];
}

/**
 * Result of applying a map stage.
 */
export interface MapStageOutcome {
  /** Transformed dataset */
  dataset: Dataset;
  /**
   * Per target column, the number of rows where the derived value is null
   * although at least one source value was non-null.
   */
  nullified: Record<string, number>;
}

// ============================================================================
// Schema Checks
// ============================================================================

/**
 * Ensure a dataset has every named column.
 *
 * @param dataset - Dataset to check
 * @param names - Required column names
 * @param stageId - Stage requiring the columns, for the error message
 * @throws SchemaMismatchError listing every missing column
 */
export function requireColumns(
  dataset: Dataset,
  names: readonly string[],
  stageId?: string
): void {
  const present = new Set(dataset.columns.map((column) => column.name));
  const missing = names.filter((name) => !present.has(name));

  if (missing.length > 0) {
    const where = stageId ? ` for stage ${stageId}` : '';
    throw new SchemaMismatchError(
      `Missing required column(s)${where}: ${missing.join(', ')}. ` +
        `Available columns: ${[...present].join(', ') || '(none)'}`,
      stageId,
      missing
    );
  }
}

// ============================================================================
// Map Stage
// ============================================================================

/**
 * Apply a map stage to a dataset.
 *
 * @param dataset - Input dataset (not modified)
 * @param plan - Mappings and columns to drop
 * @param stageId - Stage ID for error messages
 * @returns New dataset and per-column nullification counts
 * @throws SchemaMismatchError if a source or dropped column is missing
 *
 * @example
 * ```typescript
 * const { dataset: out } = applyMapStage(dataset, {
 *   mappings: [mapColumn('zone', 'string', (value) => String(value).trim())],
 * });
 * ```
 */
export function applyMapStage(
  dataset: Dataset,
  plan: MapStagePlan,
  stageId?: string
): MapStageOutcome {
  const drop = plan.drop ?? [];
  requireColumns(
    dataset,
    [...new Set([...plan.mappings.flatMap((mapping) => mapping.sources), ...drop])],
    stageId
  );

  const dropped = new Set(drop);
  const targets = new Map(plan.mappings.map((mapping) => [mapping.target, mapping]));

  // Existing columns keep their position; new targets are appended in mapping order
  const columns: Column[] = dataset.columns.map((column) => {
    const mapping = targets.get(column.name);
    return mapping ? { name: column.name, type: mapping.type } : column;
  });
  const existing = new Set(columns.map((column) => column.name));
  for (const mapping of plan.mappings) {
    if (!existing.has(mapping.target)) {
      columns.push({ name: mapping.target, type: mapping.type });
      existing.add(mapping.target);
    }
  }

  const nullified: Record<string, number> = {};
  for (const mapping of plan.mappings) {
    nullified[mapping.target] = 0;
  }

  const rows = dataset.rows.map((row) => {
    const out: Record<string, CellValue> = { ...row };

    for (const mapping of plan.mappings) {
      const value = mapping.derive(row);
      out[mapping.target] = value;

      if (value === null && mapping.sources.some((source) => (row[source] ?? null) !== null)) {
        nullified[mapping.target]++;
      }
    }

    for (const name of dropped) {
      delete out[name];
    }
    return out;
  });

  return {
    dataset: {
      columns: columns.filter((column) => !dropped.has(column.name)),
      rows,
    },
    nullified,
  };
}

/**
 * Build a mapping that rewrites a single column in place.
 *
 * @param column - Column to rewrite
 * @param type - Declared type after the rewrite
 * @param fn - Function from the old cell value to the new one
 */
export function mapColumn<T extends CellValue>(
  column: string,
  type: ColumnType,
  fn: (value: CellValue) => T | null
): ColumnMapping<T> {
  return {
    target: column,
    type,
    sources: [column],
    derive: (row) => fn(row[column] ?? null),
  };
}

/**
 * Build a mapping that derives a new column from one source column.
 *
 * @param source - Column the value is read from
 * @param target - Column the value is written to
 * @param type - Declared type of the target column
 * @param fn - Function from the source cell value to the target value
 */
export function deriveColumn<T extends CellValue>(
  source: string,
  target: string,
  type: ColumnType,
  fn: (value: CellValue) => T | null
): ColumnMapping<T> {
  return {
    target,
    type,
    sources: [source],
    derive: (row) => fn(row[source] ?? null),
  };
}

// ============================================================================
// Rename
// ============================================================================

/**
 * Rename every column of a dataset.
 *
 * @param dataset - Input dataset (not modified)
 * @param rename - Function from old name to new name
 * @param stageId - Stage ID for error messages
 * @returns Dataset with renamed columns and re-keyed rows
 * @throws SchemaMismatchError if two columns map to the same new name
 */
export function renameColumns(
  dataset: Dataset,
  rename: (name: string) => string,
  stageId?: string
): Dataset {
  const renamed = dataset.columns.map((column) => ({
    from: column.name,
    to: rename(column.name),
    type: column.type,
  }));

  const seen = new Map<string, string>();
  for (const { from, to } of renamed) {
    const previous = seen.get(to);
    if (previous !== undefined) {
      throw new SchemaMismatchError(
        `Columns "${previous}" and "${from}" both map to "${to}"`,
        stageId,
        [previous, from]
      );
    }
    seen.set(to, from);
  }

  return {
    columns: renamed.map(({ to, type }) => ({ name: to, type })),
    rows: dataset.rows.map((row) => {
      const out: Record<string, CellValue> = {};
      for (const { from, to } of renamed) {
        out[to] = row[from] ?? null;
      }
      return out;
    }),
  };
}
