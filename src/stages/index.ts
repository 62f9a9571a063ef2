/**
 * Normalization Stages
 *
 * The five stages in execution order, plus a synchronous runner that
 * composes their pure transforms.
 *
 * @module stages
 */

import type { Dataset } from '../dataset/types.js';
import type { NormalizationOptions, Stage } from '../pipeline/types.js';
import { headerCanonicalizerStage } from './header-canonicalizer.js';
import { numericCoercerStage } from './numeric-coercer.js';
import { percentageRescalerStage } from './percentage-rescaler.js';
import { rangeSplitterStage } from './range-splitter.js';
import { categoryNormalizerStage } from './category-normalizer.js';

export * from './columns.js';
export {
  canonicalizeHeader,
  canonicalizeHeaders,
  canonicalizeColumnNames,
  headerCanonicalizerStage,
} from './header-canonicalizer.js';
export { coerceCount, coerceCounts, numericCoercerStage } from './numeric-coercer.js';
export { rescalePercentage, rescaleCoverage, percentageRescalerStage } from './percentage-rescaler.js';
export {
  splitRange,
  splitRangeSegments,
  splitRanges,
  rangeSplitterStage,
  type RangeBounds,
} from './range-splitter.js';
export {
  GROUP_SEPARATOR,
  DEFAULT_GROUP_OVERRIDES,
  prefixOverride,
  buildGroupOverrides,
  defaultGroupLabel,
  deriveGroupLabel,
  groupCategories,
  categoryNormalizerStage,
  type GroupOverrideRule,
} from './category-normalizer.js';

/**
 * All stages in execution order (01 → 05).
 */
export const NORMALIZATION_STAGES: readonly Stage[] = [
  headerCanonicalizerStage,
  numericCoercerStage,
  percentageRescalerStage,
  rangeSplitterStage,
  categoryNormalizerStage,
];

/**
 * Result of a synchronous normalization run.
 */
export interface NormalizationOutcome {
  /** Canonical dataset */
  dataset: Dataset;
  /** Per stage ID, per column nullification counts */
  nullified: Record<string, Record<string, number>>;
}

/**
 * Run all five stages over a dataset without I/O, timing or checkpoints.
 *
 * @param dataset - Loaded dataset with raw column names
 * @param options - Normalization options
 * @returns Canonical dataset and nullification counts
 * @throws SchemaMismatchError if a stage's required columns are missing
 *
 * @example
 * ```typescript
 * const { dataset: canonical } = runNormalization(await readCsvDataset('coverage.csv'));
 * ```
 */
export function runNormalization(
  dataset: Dataset,
  options: NormalizationOptions = {}
): NormalizationOutcome {
  const nullified: Record<string, Record<string, number>> = {};
  let current = dataset;

  for (const stage of NORMALIZATION_STAGES) {
    const outcome = stage.transform(current, options);
    nullified[stage.id] = outcome.nullified;
    current = outcome.dataset;
  }

  return { dataset: current, nullified };
}
