/**
 * Tests for Range Splitter (Stage 04)
 */

import { describe, it, expect } from '@jest/globals';
import { createDataset } from '../dataset/types.js';
import { splitRange, splitRangeSegments, splitRanges, rangeSplitterStage } from './range-splitter.js';

// ============================================================================
// splitRange
// ============================================================================

describe('splitRange', () => {
  it('splits a plain range', () => {
    expect(splitRange('80.0-95.5')).toEqual([80, 95.5]);
  });

  it('yields a null upper bound when there is no separator', () => {
    expect(splitRange('80.0')).toEqual([80, null]);
  });

  it('treats a leading minus as a sign', () => {
    expect(splitRange('-5.0-10.0')).toEqual([-5, 10]);
  });

  it('treats a minus right after the separator as a sign', () => {
    expect(splitRange('-10.0--5.0')).toEqual([-10, -5]);
  });

  it('allows whitespace around the separator', () => {
    expect(splitRange('80.0 - 95.5')).toEqual([80, 95.5]);
  });

  it('ignores segments past the second', () => {
    expect(splitRange('1-2-3')).toEqual([1, 2]);
  });

  it('rounds bounds to one decimal', () => {
    expect(splitRange('82.04-91.96')).toEqual([82, 92]);
  });

  it('returns nulls for unparseable input', () => {
    expect(splitRange(null)).toEqual([null, null]);
    expect(splitRange('')).toEqual([null, null]);
    expect(splitRange('abc-def')).toEqual([null, null]);
    expect(splitRange('80.0-x')).toEqual([80, null]);
    expect(splitRange('1000.0-1.0')).toEqual([null, 1]);
  });
});

describe('splitRangeSegments', () => {
  it('trims each segment', () => {
    expect(splitRangeSegments(' 80.0 -95.5 ')).toEqual(['80.0', '95.5']);
  });
});

// ============================================================================
// Dataset transform
// ============================================================================

describe('splitRanges', () => {
  const input = createDataset(
    ['zone', '95_pct_ci', 'vaccine'],
    [
      { zone: 'Central', '95_pct_ci': '82.0-92.0', vaccine: 'HBV' },
      { zone: 'Western', '95_pct_ci': '80.0', vaccine: 'HPV' },
      { zone: 'Eastern', '95_pct_ci': null, vaccine: 'Td' },
    ]
  );

  it('replaces the interval column with two bound columns', () => {
    const { dataset } = splitRanges(input);

    expect(dataset.columns).toEqual([
      { name: 'zone', type: 'unknown' },
      { name: 'vaccine', type: 'unknown' },
      { name: 'lower_95_pct_ci', type: 'decimal(4,1)' },
      { name: 'upper_95_pct_ci', type: 'decimal(4,1)' },
    ]);
    expect(dataset.rows).toEqual([
      { zone: 'Central', vaccine: 'HBV', lower_95_pct_ci: 82, upper_95_pct_ci: 92 },
      { zone: 'Western', vaccine: 'HPV', lower_95_pct_ci: 80, upper_95_pct_ci: null },
      { zone: 'Eastern', vaccine: 'Td', lower_95_pct_ci: null, upper_95_pct_ci: null },
    ]);
  });

  it('counts a missing upper bound as nullified', () => {
    const { nullified } = splitRanges(input);
    expect(nullified).toEqual({ lower_95_pct_ci: 0, upper_95_pct_ci: 1 });
  });
});

describe('rangeSplitterStage', () => {
  it('has the expected identity', () => {
    expect(rangeSplitterStage.id).toBe('04_ci_split');
    expect(rangeSplitterStage.requiredColumns).toEqual(['95_pct_ci']);
  });
});
