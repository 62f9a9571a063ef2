/**
 * Tests for Percentage Rescaler (Stage 03)
 */

import { describe, it, expect } from '@jest/globals';
import { createDataset } from '../dataset/types.js';
import { rescalePercentage, rescaleCoverage, percentageRescalerStage } from './percentage-rescaler.js';

describe('rescalePercentage', () => {
  it('multiplies by 100 and rounds to one decimal', () => {
    expect(rescalePercentage(0.873)).toBe(87.3);
    expect(rescalePercentage(0.875)).toBe(87.5);
    expect(rescalePercentage(1)).toBe(100);
  });

  it('accepts numeric strings', () => {
    expect(rescalePercentage('0.5')).toBe(50);
  });

  it('passes null through', () => {
    expect(rescalePercentage(null)).toBeNull();
  });

  it('returns null for text and overflow', () => {
    expect(rescalePercentage('high')).toBeNull();
    expect(rescalePercentage(10)).toBeNull();
  });

  it('does not validate the range', () => {
    expect(rescalePercentage(1.5)).toBe(150);
    expect(rescalePercentage(-0.1)).toBe(-10);
  });
});

describe('rescaleCoverage', () => {
  it('declares decimal(4,1) and counts failures', () => {
    const input = createDataset(
      ['pct_coverage'],
      [{ pct_coverage: 0.873 }, { pct_coverage: 'n/a' }, { pct_coverage: null }]
    );

    const { dataset, nullified } = rescaleCoverage(input);

    expect(dataset.columns).toEqual([{ name: 'pct_coverage', type: 'decimal(4,1)' }]);
    expect(dataset.rows.map((row) => row.pct_coverage)).toEqual([87.3, null, null]);
    expect(nullified).toEqual({ pct_coverage: 1 });
  });
});

describe('percentageRescalerStage', () => {
  it('has the expected identity', () => {
    expect(percentageRescalerStage.id).toBe('03_coverage_rescaled');
    expect(percentageRescalerStage.requiredColumns).toEqual(['pct_coverage']);
  });
});
