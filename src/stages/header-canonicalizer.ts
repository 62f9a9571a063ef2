/**
 * Header Canonicalizer (Stage 01)
 *
 * Rewrites raw column names into lowercase snake_case:
 * `#` becomes `no`, `%` becomes `pct`, spaces become `_`.
 *
 * @module stages/header-canonicalizer
 */

import type { Dataset } from '../dataset/types.js';
import { renameColumns } from '../pipeline/map-stage.js';
import { defineStage } from '../pipeline/stage.js';
import { buildStageId } from '../pipeline/types.js';

// ============================================================================
// Constants
// ============================================================================

/** A word character directly followed by `#` or `%` */
const SYMBOL_AFTER_WORD = /([\p{L}\p{N}_])([#%])/gu;

/** Characters substituted in the single replacement pass */
const SUBSTITUTABLE = /[#% ]/g;

const SUBSTITUTIONS: Readonly<Record<string, string>> = {
  '#': 'no',
  '%': 'pct',
  ' ': '_',
};

// ============================================================================
// Header Canonicalization
// ============================================================================

/**
 * Canonicalize a single column name.
 *
 * 1. Separate a word character from a directly following `#` / `%` with a space
 * 2. Substitute `#`, `%` and space in one left-to-right pass, so inserted
 *    text (`no`, `pct`) is never re-scanned
 * 3. Lower-case the result
 *
 * Total and idempotent; characters outside the table pass through unchanged.
 *
 * @example
 * ```typescript
 * canonicalizeHeader('% Coverage'); // 'pct_coverage'
 * canonicalizeHeader('95% CI');     // '95_pct_ci'
 * canonicalizeHeader('# Eligible'); // 'no_eligible'
 * ```
 */
export function canonicalizeHeader(name: string): string {
  return name
    .replace(SYMBOL_AFTER_WORD, '$1 $2')
    .replace(SUBSTITUTABLE, (char) => SUBSTITUTIONS[char] ?? char)
    .toLowerCase();
}

/**
 * Canonicalize a list of column names, preserving length and order.
 */
export function canonicalizeHeaders(names: readonly string[]): string[] {
  return names.map(canonicalizeHeader);
}

/**
 * Rename every column of a dataset to its canonical name.
 *
 * @throws SchemaMismatchError if two raw names canonicalize to the same name
 */
export function canonicalizeColumnNames(dataset: Dataset): Dataset {
  return renameColumns(dataset, canonicalizeHeader, buildStageId(1, 'headers_canonicalized'));
}

// ============================================================================
// Stage
// ============================================================================

export const headerCanonicalizerStage = defineStage({
  number: 1,
  requiredColumns: [],
  transform: (input) => ({ dataset: canonicalizeColumnNames(input), nullified: {} }),
});
