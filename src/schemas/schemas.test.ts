/**
 * Schema Validation Tests
 *
 * Tests for the schemas of persisted files: checkpoints, manifests,
 * tables and group override files.
 */

import { describe, it, expect } from '@jest/globals';
import {
  SCHEMA_VERSIONS,
  isCurrentVersion,
  ColumnTypeSchema,
  DatasetSchema,
  StageIdSchema,
  StageMetadataSchema,
  createStageMetadata,
  parseStageNumber,
  RunManifestSchema,
  buildRunManifest,
  totalNullified,
  TableNameSchema,
  TableFileSchema,
  GroupOverrideFileSchema,
  type ManifestStageEntry,
} from './index.js';

const SHA = 'a'.repeat(64);

// ============================================================================
// Versions
// ============================================================================

describe('isCurrentVersion', () => {
  it('compares against the registry', () => {
    expect(isCurrentVersion('table', SCHEMA_VERSIONS.table)).toBe(true);
    expect(isCurrentVersion('table', SCHEMA_VERSIONS.table + 1)).toBe(false);
  });
});

// ============================================================================
// Dataset
// ============================================================================

describe('ColumnTypeSchema', () => {
  it('accepts known types', () => {
    for (const type of ['unknown', 'string', 'integer', 'decimal(4,1)']) {
      expect(ColumnTypeSchema.safeParse(type).success).toBe(true);
    }
  });

  it('rejects other types', () => {
    for (const type of ['double', 'decimal(4)', 'decimal(a,b)', 42]) {
      expect(ColumnTypeSchema.safeParse(type).success).toBe(false);
    }
  });
});

describe('DatasetSchema', () => {
  it('accepts null, number, string and boolean cells', () => {
    const result = DatasetSchema.safeParse({
      columns: [{ name: 'a', type: 'unknown' }],
      rows: [{ a: null }, { a: 1 }, { a: 'x' }, { a: true }],
    });
    expect(result.success).toBe(true);
  });

  it('rejects nested values', () => {
    const result = DatasetSchema.safeParse({
      columns: [{ name: 'a', type: 'unknown' }],
      rows: [{ a: { nested: true } }],
    });
    expect(result.success).toBe(false);
  });
});

// ============================================================================
// Stage metadata
// ============================================================================

describe('stage metadata', () => {
  it('validates stage IDs', () => {
    expect(StageIdSchema.safeParse('04_ci_split').success).toBe(true);
    expect(StageIdSchema.safeParse('4_ci_split').success).toBe(false);
    expect(StageIdSchema.safeParse('04-ci-split').success).toBe(false);
  });

  it('creates valid metadata', () => {
    const metadata = createStageMetadata({
      stageNumber: 4,
      stageName: 'ci_split',
      runId: '20260102-143512',
      upstreamStage: '03_coverage_rescaled',
      stats: { rowsIn: 3, rowsOut: 3, nullified: { coverage_lower_ci: 1 } },
    });

    expect(metadata.stageId).toBe('04_ci_split');
    expect(metadata.schemaVersion).toBe(SCHEMA_VERSIONS.stage);
    expect(StageMetadataSchema.safeParse(metadata).success).toBe(true);
  });

  it('rejects negative stage stats', () => {
    const metadata = createStageMetadata({
      stageNumber: 2,
      stageName: 'counts_coerced',
      runId: '20260102-143512',
      stats: { rowsIn: 3, rowsOut: 3, nullified: { no_eligible: -1 } },
    });
    expect(StageMetadataSchema.safeParse(metadata).success).toBe(false);
  });

  it('parses stage numbers', () => {
    expect(parseStageNumber('05_vaccine_grouped')).toBe(5);
    expect(() => parseStageNumber('vaccine_grouped')).toThrow('Invalid stage ID format: vaccine_grouped');
  });
});

// ============================================================================
// Manifest
// ============================================================================

describe('manifest helpers', () => {
  const entry: ManifestStageEntry = {
    stageId: '01_headers_canonicalized',
    filename: '01_headers_canonicalized.json',
    createdAt: '2026-01-02T14:35:12.000Z',
    sha256: SHA,
    sizeBytes: 120,
    rowCount: 2,
    nullifiedCount: 0,
  };
  const second: ManifestStageEntry = {
    ...entry,
    stageId: '02_counts_coerced',
    filename: '02_counts_coerced.json',
    nullifiedCount: 3,
    upstreamStage: '01_headers_canonicalized',
  };

  it('lists executed stages in order', () => {
    const manifest = buildRunManifest({
      runId: '20260102-143512',
      stages: [entry, second],
      success: true,
      source: 'coverage.csv',
    });

    expect(manifest.stagesExecuted).toEqual(['01_headers_canonicalized', '02_counts_coerced']);
    expect(manifest.finalStage).toBe('02_counts_coerced');
    expect(manifest.source).toBe('coverage.csv');
    expect(totalNullified(manifest)).toBe(3);
    expect(RunManifestSchema.safeParse(manifest).success).toBe(true);
  });

  it('leaves finalStage empty without checkpoints', () => {
    const manifest = buildRunManifest({ runId: '20260102-143512', stages: [], success: false });
    expect(manifest.finalStage).toBe('');
    expect(RunManifestSchema.safeParse(manifest).success).toBe(true);
  });

  it('rejects a malformed hash', () => {
    const manifest = buildRunManifest({
      runId: '20260102-143512',
      stages: [{ ...entry, sha256: 'not-a-hash' }],
      success: true,
    });
    expect(RunManifestSchema.safeParse(manifest).success).toBe(false);
  });

  it('rejects stagesExecuted out of step with the entries', () => {
    const manifest = buildRunManifest({ runId: '20260102-143512', stages: [entry, second], success: true });
    const reordered = { ...manifest, stagesExecuted: ['02_counts_coerced', '01_headers_canonicalized'] };
    expect(RunManifestSchema.safeParse(reordered).success).toBe(false);
  });

  it('defaults a missing nullified count to zero', () => {
    const { nullifiedCount: _omitted, ...legacy } = entry;
    const parsed = RunManifestSchema.parse({
      ...buildRunManifest({ runId: '20260102-143512', stages: [], success: true }),
      stages: [legacy],
      stagesExecuted: ['01_headers_canonicalized'],
    });
    expect(parsed.stages[0].nullifiedCount).toBe(0);
  });
});

// ============================================================================
// Tables
// ============================================================================

describe('table schemas', () => {
  it('validates table names', () => {
    expect(TableNameSchema.safeParse('ns_school_immunization').success).toBe(true);
    expect(TableNameSchema.safeParse('2018_coverage').success).toBe(false);
    expect(TableNameSchema.safeParse('Coverage').success).toBe(false);
  });

  it('requires rowCount to match the rows', () => {
    const table = {
      schemaVersion: 1,
      tableName: 'coverage',
      savedAt: '2026-01-02T14:35:12.000Z',
      columns: [{ name: 'year', type: 'unknown' }],
      rowCount: 1,
      rows: [{ year: 2018 }],
    };

    expect(TableFileSchema.safeParse(table).success).toBe(true);
    expect(TableFileSchema.safeParse({ ...table, rowCount: 2 }).success).toBe(false);
  });
});

// ============================================================================
// Overrides
// ============================================================================

describe('GroupOverrideFileSchema', () => {
  it('defaults the schema version', () => {
    const file = GroupOverrideFileSchema.parse({ overrides: [{ prefix: 'HPV' }] });

    expect(file.schemaVersion).toBe(SCHEMA_VERSIONS.overrides);
    expect(file.overrides[0].label).toBeUndefined();
  });

  it('rejects an empty label', () => {
    expect(GroupOverrideFileSchema.safeParse({ overrides: [{ prefix: 'HPV', label: '' }] }).success).toBe(
      false
    );
  });
});
