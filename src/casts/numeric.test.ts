/**
 * Tests for numeric casts
 */

import { describe, it, expect } from '@jest/globals';
import {
  castInteger,
  castDouble,
  castDecimal,
  formatDecimal,
  INT32_MAX,
  INT32_MIN,
} from './numeric.js';

describe('castInteger', () => {
  it('parses plain integer strings', () => {
    expect(castInteger('1234')).toBe(1234);
    expect(castInteger('-17')).toBe(-17);
    expect(castInteger('+8')).toBe(8);
  });

  it('ignores surrounding whitespace', () => {
    expect(castInteger('  42 ')).toBe(42);
  });

  it('truncates a fractional part toward zero', () => {
    expect(castInteger('12.7')).toBe(12);
    expect(castInteger('-12.7')).toBe(-12);
    expect(castInteger(9.99)).toBe(9);
    expect(castInteger(-9.99)).toBe(-9);
  });

  it('returns null for non-numeric input', () => {
    expect(castInteger('abc')).toBeNull();
    expect(castInteger('')).toBeNull();
    expect(castInteger('1,234')).toBeNull();
    expect(castInteger('1e3')).toBeNull();
    expect(castInteger(true)).toBeNull();
    expect(castInteger(null)).toBeNull();
  });

  it('returns null outside the 32-bit range', () => {
    expect(castInteger(String(INT32_MAX))).toBe(INT32_MAX);
    expect(castInteger(String(INT32_MIN))).toBe(INT32_MIN);
    expect(castInteger('2147483648')).toBeNull();
    expect(castInteger('-2147483649')).toBeNull();
    expect(castInteger('99999999999999999999')).toBeNull();
    expect(castInteger(Number.POSITIVE_INFINITY)).toBeNull();
  });

  it('accepts leading zeros', () => {
    expect(castInteger('0000000000042')).toBe(42);
  });

  it('never returns negative zero', () => {
    expect(Object.is(castInteger('-0'), 0)).toBe(true);
    expect(Object.is(castInteger(-0.5), 0)).toBe(true);
  });
});

describe('castDouble', () => {
  it('passes finite numbers through', () => {
    expect(castDouble(0.873)).toBe(0.873);
  });

  it('parses numeric strings', () => {
    expect(castDouble(' 0.5 ')).toBe(0.5);
    expect(castDouble('.25')).toBe(0.25);
    expect(castDouble('1e-2')).toBe(0.01);
  });

  it('returns null for anything else', () => {
    expect(castDouble('n/a')).toBeNull();
    expect(castDouble('.')).toBeNull();
    expect(castDouble('')).toBeNull();
    expect(castDouble(Number.NaN)).toBeNull();
    expect(castDouble(false)).toBeNull();
    expect(castDouble(null)).toBeNull();
  });
});

describe('castDecimal', () => {
  it('keeps values that already fit', () => {
    expect(castDecimal('80.0', 4, 1)).toBe(80);
    expect(castDecimal('95.5', 4, 1)).toBe(95.5);
    expect(castDecimal(999.9, 4, 1)).toBe(999.9);
  });

  it('rounds half away from zero on the decimal text', () => {
    expect(castDecimal(87.35, 4, 1)).toBe(87.4);
    expect(castDecimal(-87.35, 4, 1)).toBe(-87.4);
    expect(castDecimal('0.05', 4, 1)).toBe(0.1);
    expect(castDecimal('0.04', 4, 1)).toBe(0);
  });

  it('absorbs binary floating-point noise', () => {
    expect(castDecimal(87.30000000000001, 4, 1)).toBe(87.3);
    expect(castDecimal(87.29999999999999, 4, 1)).toBe(87.3);
  });

  it('returns null when the integer part needs too many digits', () => {
    expect(castDecimal('1000.0', 4, 1)).toBeNull();
    expect(castDecimal(999.96, 4, 1)).toBeNull();
  });

  it('handles exponents', () => {
    expect(castDecimal('8.75e1', 4, 1)).toBe(87.5);
    expect(castDecimal(1e-7, 4, 1)).toBe(0);
  });

  it('returns null for non-numeric input', () => {
    expect(castDecimal('82.0-92.0', 4, 1)).toBeNull();
    expect(castDecimal('', 4, 1)).toBeNull();
    expect(castDecimal(null, 4, 1)).toBeNull();
    expect(castDecimal(true, 4, 1)).toBeNull();
  });
});

describe('formatDecimal', () => {
  it('pads to the scale', () => {
    expect(formatDecimal(82, 1)).toBe('82.0');
    expect(formatDecimal(-5, 1)).toBe('-5.0');
  });
});
