/**
 * Range Splitter (Stage 04)
 *
 * Splits the textual confidence interval ("82.0-92.0") into lower and upper
 * decimal(4,1) bound columns and drops the interval column.
 *
 * Separator policy: the bounds are separated by the first `-` that follows a
 * digit or `.` (whitespace allowed in between). A `-` at the start of the
 * string or right after the separator is a sign, so negative bounds split
 * as expected:
 *
 * | input          | lower | upper |
 * |----------------|-------|-------|
 * | `"80.0-95.5"`  | 80.0  | 95.5  |
 * | `"-5.0-10.0"`  | -5.0  | 10.0  |
 * | `"-10.0--5.0"` | -10.0 | -5.0  |
 * | `"80.0"`       | 80.0  | null  |
 *
 * @module stages/range-splitter
 */

import { castDecimal } from '../casts/numeric.js';
import { decimalType, type CellValue, type Dataset } from '../dataset/types.js';
import { applyMapStage, deriveColumn, type MapStageOutcome } from '../pipeline/map-stage.js';
import { defineStage } from '../pipeline/stage.js';
import { buildStageId } from '../pipeline/types.js';
import {
  CI_COLUMN,
  CI_LOWER_COLUMN,
  CI_UPPER_COLUMN,
  PERCENT_PRECISION,
  PERCENT_SCALE,
} from './columns.js';

/** `-` preceded by a digit or `.`, optionally with whitespace before it */
const RANGE_SEPARATOR = /(?<=[\d.])\s*-/;

/**
 * Lower and upper bound; either may be null.
 */
export type RangeBounds = readonly [lower: number | null, upper: number | null];

/**
 * Split interval text into its raw segments.
 *
 * @example splitRangeSegments('80.0-95.5') // ['80.0', '95.5']
 */
export function splitRangeSegments(text: string): string[] {
  return text.split(RANGE_SEPARATOR).map((segment) => segment.trim());
}

/**
 * Split an interval cell into decimal bounds.
 *
 * Segment 0 is the lower bound and segment 1 the upper bound; a missing
 * segment or one that does not parse yields null. Further segments are
 * ignored.
 *
 * @example
 * ```typescript
 * splitRange('80.0-95.5'); // [80, 95.5]
 * splitRange('80.0');      // [80, null]
 * ```
 */
export function splitRange(value: CellValue): RangeBounds {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return [null, null];
  }

  const segments = splitRangeSegments(String(value));
  return [toBound(segments[0]), toBound(segments[1])];
}

function toBound(segment: string | undefined): number | null {
  if (segment === undefined) {
    return null;
  }
  return castDecimal(segment, PERCENT_PRECISION, PERCENT_SCALE);
}

/**
 * Replace an interval column with lower and upper bound columns.
 *
 * Both bounds are derived from the original interval cell; the interval
 * column is dropped afterwards.
 */
export function splitRanges(
  dataset: Dataset,
  column: string = CI_COLUMN,
  lowerColumn: string = CI_LOWER_COLUMN,
  upperColumn: string = CI_UPPER_COLUMN
): MapStageOutcome {
  const type = decimalType(PERCENT_PRECISION, PERCENT_SCALE);

  return applyMapStage(
    dataset,
    {
      mappings: [
        deriveColumn(column, lowerColumn, type, (value) => splitRange(value)[0]),
        deriveColumn(column, upperColumn, type, (value) => splitRange(value)[1]),
      ],
      drop: [column],
    },
    buildStageId(4, 'ci_split')
  );
}

export const rangeSplitterStage = defineStage({
  number: 4,
  requiredColumns: [CI_COLUMN],
  transform: (input) => splitRanges(input),
});
