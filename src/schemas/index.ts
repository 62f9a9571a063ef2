/**
 * Zod Schemas for Persisted Data
 *
 * Central export point for all schema definitions.
 */

// ============================================================================
// Version Registry
// ============================================================================

export { SCHEMA_VERSIONS, isCurrentVersion, type SchemaType } from './versions.js';

// ============================================================================
// Common Types
// ============================================================================

export {
  ISO8601TimestampSchema,
  CellValueSchema,
  ColumnTypeSchema,
  ColumnSchema,
  DatasetSchema,
  type ISO8601Timestamp,
  type ColumnDefinition,
} from './common.js';

// ============================================================================
// Stage Checkpoints
// ============================================================================

export {
  STAGE_ID_PATTERN,
  StageIdSchema,
  StageMetadataSchema,
  StageStatsSchema,
  StageOutputSchema,
  createStageMetadata,
  parseStageNumber,
  type StageMetadata,
  type StageStats,
} from './stage.js';

// ============================================================================
// Run Manifest
// ============================================================================

export {
  ManifestStageEntrySchema,
  RunManifestSchema,
  buildRunManifest,
  totalNullified,
  type ManifestStageEntry,
  type RunManifest,
} from './manifest.js';

// ============================================================================
// Tables
// ============================================================================

export {
  TABLE_NAME_PATTERN,
  TableNameSchema,
  TableFileSchema,
  type TableFile,
} from './table.js';

// ============================================================================
// Group Overrides
// ============================================================================

export {
  PrefixOverrideSchema,
  GroupOverrideFileSchema,
  type PrefixOverride,
  type GroupOverrideFile,
} from './overrides.js';
