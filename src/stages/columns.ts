/**
 * Canonical Column Names
 *
 * Names the stages read and write after header canonicalization.
 *
 * @module stages/columns
 */

/** Survey year */
export const YEAR_COLUMN = 'year';

/** Health zone */
export const ZONE_COLUMN = 'zone';

/** Fine-grained vaccine / dose name */
export const VACCINE_COLUMN = 'vaccine';

/** Count of eligible students */
export const ELIGIBLE_COLUMN = 'no_eligible';

/** Count of immunized students */
export const IMMUNIZED_COLUMN = 'no_immunized';

/** Coverage percentage */
export const COVERAGE_COLUMN = 'pct_coverage';

/** Confidence interval as text, e.g. "82.0-92.0" */
export const CI_COLUMN = '95_pct_ci';

/** Lower confidence bound */
export const CI_LOWER_COLUMN = 'lower_95_pct_ci';

/** Upper confidence bound */
export const CI_UPPER_COLUMN = 'upper_95_pct_ci';

/** Coarse vaccine group derived from the vaccine name */
export const VACCINE_GROUP_COLUMN = 'vaccine_group';

/** Columns holding counts with thousands separators */
export const COUNT_COLUMNS: readonly string[] = [IMMUNIZED_COLUMN, ELIGIBLE_COLUMN];

/** Precision and scale of percentage columns: decimal(4,1) */
export const PERCENT_PRECISION = 4;
export const PERCENT_SCALE = 1;

