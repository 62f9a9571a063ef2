/**
 * Category Normalizer (Stage 05)
 *
 * Derives a coarse vaccine group from the fine-grained vaccine name so that
 * every group is comparable across years even where dose naming changed
 * ("HBV" one year, "HBV - Dose 1" / "HBV - Dose 2" the next).
 *
 * The default label is the text before the first `" - "`. An ordered list of
 * override rules is then consulted; the first matching rule replaces the
 * label. Names such as "MEN-C-ACYW135" use `-` inside a token rather than as
 * a dose delimiter and are handled by the built-in `MEN-C` rule.
 *
 * @module stages/category-normalizer
 */

import type { CellValue, Dataset } from '../dataset/types.js';
import { ConfigurationError } from '../errors/index.js';
import { applyMapStage, deriveColumn, type MapStageOutcome } from '../pipeline/map-stage.js';
import { defineStage } from '../pipeline/stage.js';
import { buildStageId } from '../pipeline/types.js';
import type { PrefixOverride } from '../schemas/overrides.js';
import { VACCINE_COLUMN, VACCINE_GROUP_COLUMN } from './columns.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Override applied after the default split.
 */
export interface GroupOverrideRule {
  /** Human-readable description for logs */
  description: string;

  /** Whether the rule applies to a default-derived label */
  matches(label: string): boolean;

  /** Label forced when the rule matches */
  label: string;

  /** Prefix the rule matches on, for prefix rules */
  prefix?: string;
}

// ============================================================================
// Rules
// ============================================================================

/** Separator between group and variant in vaccine names */
export const GROUP_SEPARATOR = ' - ';

/**
 * Build a rule matching labels that start with `prefix`.
 */
export function prefixOverride(prefix: string, label: string = prefix): GroupOverrideRule {
  return {
    description: `labels starting with "${prefix}" -> "${label}"`,
    matches: (candidate) => candidate.startsWith(prefix),
    label,
    prefix,
  };
}

/**
 * Built-in overrides.
 */
export const DEFAULT_GROUP_OVERRIDES: readonly GroupOverrideRule[] = [prefixOverride('MEN-C')];

/**
 * Combine the built-in overrides with user-supplied prefix overrides.
 *
 * User rules are appended after the built-in ones. Two prefix rules whose
 * prefixes overlap (one starts with the other) must force the same label,
 * otherwise the result would depend on rule order.
 *
 * @throws ConfigurationError for overlapping prefixes with different labels
 */
export function buildGroupOverrides(
  extra: readonly PrefixOverride[] = [],
  base: readonly GroupOverrideRule[] = DEFAULT_GROUP_OVERRIDES
): GroupOverrideRule[] {
  const rules = [...base, ...extra.map((entry) => prefixOverride(entry.prefix, entry.label))];

  const conflicts: string[] = [];
  for (let i = 0; i < rules.length; i++) {
    for (let j = i + 1; j < rules.length; j++) {
      const a = rules[i];
      const b = rules[j];
      if (a.prefix === undefined || b.prefix === undefined || a.label === b.label) {
        continue;
      }
      if (a.prefix.startsWith(b.prefix) || b.prefix.startsWith(a.prefix)) {
        conflicts.push(
          `"${a.prefix}" -> "${a.label}" overlaps "${b.prefix}" -> "${b.label}"`
        );
      }
    }
  }

  if (conflicts.length > 0) {
    throw new ConfigurationError('Group override prefixes must not overlap', conflicts);
  }

  return rules;
}

// ============================================================================
// Group Derivation
// ============================================================================

/**
 * Default label: the text before the first `" - "`, or the whole string.
 */
export function defaultGroupLabel(category: string): string {
  return category.split(GROUP_SEPARATOR)[0];
}

/**
 * Derive the group label of a category.
 *
 * @example
 * ```typescript
 * deriveGroupLabel('HBV - Dose 1');  // 'HBV'
 * deriveGroupLabel('MEN-C-ACYW135'); // 'MEN-C'
 * deriveGroupLabel(null);            // null
 * ```
 */
export function deriveGroupLabel(
  category: CellValue,
  rules: readonly GroupOverrideRule[] = DEFAULT_GROUP_OVERRIDES
): string | null {
  if (typeof category !== 'string' && typeof category !== 'number') {
    return null;
  }

  const label = defaultGroupLabel(String(category));
  const override = rules.find((rule) => rule.matches(label));
  return override ? override.label : label;
}

/**
 * Add the group column derived from the category column.
 */
export function groupCategories(
  dataset: Dataset,
  rules: readonly GroupOverrideRule[] = DEFAULT_GROUP_OVERRIDES,
  column: string = VACCINE_COLUMN,
  groupColumn: string = VACCINE_GROUP_COLUMN
): MapStageOutcome {
  return applyMapStage(
    dataset,
    {
      mappings: [
        deriveColumn(column, groupColumn, 'string', (value) => deriveGroupLabel(value, rules)),
      ],
    },
    buildStageId(5, 'vaccine_grouped')
  );
}

export const categoryNormalizerStage = defineStage({
  number: 5,
  requiredColumns: [VACCINE_COLUMN],
  transform: (input, options) =>
    groupCategories(input, options.groupOverrides ?? DEFAULT_GROUP_OVERRIDES),
});
