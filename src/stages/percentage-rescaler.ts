/**
 * Percentage Rescaler (Stage 03)
 *
 * Coverage arrives as a 0-1 fraction while the confidence bounds are on a
 * 0-100 scale. This stage multiplies coverage by 100 and casts it to
 * decimal(4,1). No range validation is performed.
 *
 * @module stages/percentage-rescaler
 */

import { castDecimal, castDouble } from '../casts/numeric.js';
import { decimalType, type CellValue, type Dataset } from '../dataset/types.js';
import { applyMapStage, mapColumn, type MapStageOutcome } from '../pipeline/map-stage.js';
import { defineStage } from '../pipeline/stage.js';
import { buildStageId } from '../pipeline/types.js';
import { COVERAGE_COLUMN, PERCENT_PRECISION, PERCENT_SCALE } from './columns.js';

/** Factor from fraction to percentage */
const PERCENT_FACTOR = 100;

/**
 * Rescale a fractional value to a one-decimal percentage.
 *
 * @example
 * ```typescript
 * rescalePercentage(0.873); // 87.3
 * rescalePercentage(null);  // null
 * ```
 */
export function rescalePercentage(value: CellValue): number | null {
  const fraction = castDouble(value);
  if (fraction === null) {
    return null;
  }
  return castDecimal(fraction * PERCENT_FACTOR, PERCENT_PRECISION, PERCENT_SCALE);
}

/**
 * Rescale a percentage column of a dataset.
 */
export function rescaleCoverage(
  dataset: Dataset,
  column: string = COVERAGE_COLUMN
): MapStageOutcome {
  return applyMapStage(
    dataset,
    {
      mappings: [
        mapColumn(column, decimalType(PERCENT_PRECISION, PERCENT_SCALE), rescalePercentage),
      ],
    },
    buildStageId(3, 'coverage_rescaled')
  );
}

export const percentageRescalerStage = defineStage({
  number: 3,
  requiredColumns: [COVERAGE_COLUMN],
  transform: (input) => rescaleCoverage(input),
});
