/**
 * Numeric Coercer (Stage 02)
 *
 * Strips digit-group separators from the count columns and casts them to
 * integers. Values that do not parse become null.
 *
 * @module stages/numeric-coercer
 */

import { castInteger } from '../casts/numeric.js';
import type { CellValue, Dataset } from '../dataset/types.js';
import { applyMapStage, mapColumn, type MapStageOutcome } from '../pipeline/map-stage.js';
import { defineStage } from '../pipeline/stage.js';
import { buildStageId } from '../pipeline/types.js';
import { COUNT_COLUMNS } from './columns.js';

/** Digit-group separator removed before parsing */
const GROUP_SEPARATOR = ',';

/**
 * Coerce a single count cell.
 *
 * @example
 * ```typescript
 * coerceCount('1,234'); // 1234
 * coerceCount('abc');   // null
 * ```
 */
export function coerceCount(value: CellValue): number | null {
  if (typeof value === 'string') {
    return castInteger(value.replaceAll(GROUP_SEPARATOR, ''));
  }
  return castInteger(value);
}

/**
 * Coerce the given columns of a dataset to integers. Other columns pass
 * through unchanged.
 *
 * @param dataset - Input dataset
 * @param columns - Columns to coerce
 */
export function coerceCounts(
  dataset: Dataset,
  columns: readonly string[] = COUNT_COLUMNS
): MapStageOutcome {
  return applyMapStage(
    dataset,
    { mappings: columns.map((column) => mapColumn(column, 'integer', coerceCount)) },
    buildStageId(2, 'counts_coerced')
  );
}

export const numericCoercerStage = defineStage({
  number: 2,
  requiredColumns: COUNT_COLUMNS,
  transform: (input) => coerceCounts(input),
});
