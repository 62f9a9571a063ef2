/**
 * Numeric Casts
 *
 * Null-returning casts used by the normalization stages. Every cast is total:
 * a value that cannot be represented in the target type yields `null`
 * instead of throwing.
 *
 * Decimal casts round half away from zero on the shortest decimal
 * representation of the input, so `0.873 * 100` (87.30000000000001) casts
 * to `87.3` at one fractional digit.
 *
 * @module casts/numeric
 */

import type { CellValue } from '../dataset/types.js';

// ============================================================================
// Constants
// ============================================================================

/** Smallest value of a 32-bit signed integer */
export const INT32_MIN = -2147483648;

/** Largest value of a 32-bit signed integer */
export const INT32_MAX = 2147483647;

/** Plain decimal literal with optional sign, fraction and exponent */
const DECIMAL_LITERAL = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/** Integer literal with an optional fractional part that is truncated */
const INTEGER_LITERAL = /^([+-]?)(\d+)(?:\.\d*)?$/;

// ============================================================================
// Integer Cast
// ============================================================================

/**
 * Cast a cell to a 32-bit integer.
 *
 * - Numbers are truncated toward zero
 * - Strings are trimmed; an optional fractional part is truncated
 * - Values outside the 32-bit range, booleans and other strings yield null
 *
 * @example
 * ```typescript
 * castInteger('1234');  // 1234
 * castInteger(' 12.7'); // 12
 * castInteger('abc');   // null
 * ```
 */
export function castInteger(value: CellValue): number | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return null;
    }
    return toInt32(Math.trunc(value));
  }

  if (typeof value !== 'string') {
    return null;
  }

  const match = INTEGER_LITERAL.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, sign, digits] = match;
  const significant = digits.replace(/^0+(?=\d)/, '');
  if (significant.length > 10) {
    return null;
  }

  return toInt32(Number(`${sign}${significant}`));
}

function toInt32(value: number): number | null {
  if (value < INT32_MIN || value > INT32_MAX) {
    return null;
  }
  // Normalize -0
  return value === 0 ? 0 : value;
}

// ============================================================================
// Floating-Point Cast
// ============================================================================

/**
 * Cast a cell to a finite double.
 *
 * Numeric strings are accepted; any other value yields null.
 */
export function castDouble(value: CellValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  const match = DECIMAL_LITERAL.exec(text);
  if (!match || (match[2] === '' && (match[3] ?? '') === '')) {
    return null;
  }

  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

// ============================================================================
// Decimal Cast
// ============================================================================

/**
 * Cast a cell to a fixed-point decimal with the given precision and scale.
 *
 * The result is rounded half away from zero to `scale` fractional digits.
 * Values that need more than `precision` total digits after rounding yield
 * null, as do non-numeric strings, booleans and non-finite numbers.
 *
 * @param value - Cell to cast
 * @param precision - Total number of digits
 * @param scale - Number of fractional digits
 * @returns The rounded value as a number, or null
 *
 * @example
 * ```typescript
 * castDecimal('80.0', 4, 1);    // 80
 * castDecimal(87.35, 4, 1);     // 87.4
 * castDecimal('1000.0', 4, 1);  // null (overflow)
 * ```
 */
export function castDecimal(value: CellValue, precision: number, scale: number): number | null {
  const text = toDecimalText(value);
  if (text === null) {
    return null;
  }

  const match = DECIMAL_LITERAL.exec(text);
  if (!match) {
    return null;
  }

  const [, sign, intPart = '', fracPart = '', exponent = '0'] = match;
  if (intPart === '' && fracPart === '') {
    return null;
  }

  // value = 0.<digits> * 10^point
  let digits = intPart + fracPart;
  let point = intPart.length + parseInt(exponent, 10);

  const significant = digits.replace(/^0+/, '');
  point -= digits.length - significant.length;
  digits = significant;

  if (digits === '' || point < -scale) {
    return 0;
  }
  if (point > precision - scale) {
    return null;
  }

  const keep = point + scale;
  const padded = digits.padEnd(keep + 1, '0');
  let units = BigInt(keep > 0 ? padded.slice(0, keep) : '0');
  if (padded[keep] >= '5') {
    units += 1n;
  }

  if (units >= 10n ** BigInt(precision)) {
    return null;
  }
  if (units === 0n) {
    return 0;
  }

  const magnitude = Number(units) / 10 ** scale;
  return sign === '-' ? -magnitude : magnitude;
}

function toDecimalText(value: CellValue): string | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }
  return null;
}

/**
 * Format a decimal value with exactly `scale` fractional digits.
 *
 * @example formatDecimal(82, 1) // '82.0'
 */
export function formatDecimal(value: number, scale: number): string {
  return value.toFixed(scale);
}
