/**
 * Pipeline Infrastructure
 *
 * Stage execution framework for the normalization pipeline.
 * Provides stage interfaces, the map-stage abstraction, execution context,
 * checkpointing and run manifests.
 *
 * @module pipeline
 */

// Type definitions and constants
export {
  type StageNumber,
  type StageName,
  STAGE_NAMES,
  STAGE_NUMBERS,
  TOTAL_STAGES,
  VALID_STAGE_NUMBERS,

  // Core interfaces
  type Logger,
  type NormalizationOptions,
  type StageContext,
  type StageResult,
  type Stage,
  type ExecuteOptions,

  // Helper functions
  formatStageNumber,
  buildStageId,
  getStageId,
  isValidStageNumber,
  isValidStageName,
  parseStageReference,
} from './types.js';

// Map stages
export {
  type ValueFunction,
  type ColumnMapping,
  type MapStagePlan,
  type MapStageOutcome,
  requireColumns,
  applyMapStage,
  mapColumn,
  deriveColumn,
  renameColumns,
} from './map-stage.js';

// Stage factory
export { defineStage, type StageDefinition } from './stage.js';

// Checkpoint writing
export {
  writeCheckpoint,
  readCheckpoint,
  readCheckpointData,
  validateCheckpointStructure,
  getCheckpointValidationErrors,
  type CheckpointResult,
  type Checkpoint,
} from './checkpoint.js';

// Manifest generation
export {
  type StageFileInfo,
  type ManifestVerificationResult,
  MISSING_FILE_HASH,
  calculateFileHash,
  createStageEntry,
  generateManifest,
  saveManifest,
  loadManifest,
  verifyManifest,
} from './manifest.js';

// Executor
export {
  PipelineExecutor,
  createPipelineExecutor,
  type PipelineTiming,
  type PipelineResult,
  type StageError,
  type ExecutorCallbacks,
} from './executor.js';
