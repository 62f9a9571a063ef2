/**
 * Checkpoint Writing Module
 *
 * Wraps stage output with metadata and writes checkpoints atomically.
 * All checkpoints follow the structure: { _meta: StageMetadata, data: Dataset }
 *
 * @module pipeline/checkpoint
 */

import * as fs from 'node:fs/promises';
import type { Dataset } from '../dataset/types.js';
import { DatasetSchema } from '../schemas/common.js';
import {
  StageMetadataSchema,
  StageOutputSchema,
  type StageMetadata,
} from '../schemas/stage.js';
import {
  atomicWriteJson,
  readJson,
  getStageFilePath,
  getDataDir,
} from '../storage/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of writing a checkpoint
 */
export interface CheckpointResult {
  /** Full path where checkpoint was written */
  filePath: string;
  /** The metadata that was written */
  metadata: StageMetadata;
  /** File size in bytes */
  sizeBytes: number;
}

/**
 * Structure of a checkpoint file
 */
export interface Checkpoint {
  _meta: StageMetadata;
  data: Dataset;
}

const CheckpointSchema = StageOutputSchema(DatasetSchema);

// ============================================================================
// Write Functions
// ============================================================================

/**
 * Write a stage checkpoint.
 *
 * The file is named after `metadata.stageId` inside the run directory of
 * `metadata.runId`.
 *
 * @example
 * const result = await writeCheckpoint(stageResult.metadata, stageResult.data, dataDir);
 * // result.filePath: '<dataDir>/runs/20260102-143512/04_ci_split.json'
 */
export async function writeCheckpoint(
  metadata: StageMetadata,
  data: Dataset,
  dataDir: string = getDataDir()
): Promise<CheckpointResult> {
  const checkpoint: Checkpoint = {
    _meta: metadata,
    data,
  };

  const filePath = getStageFilePath(metadata.runId, metadata.stageId, dataDir);
  await atomicWriteJson(filePath, checkpoint);

  const stats = await fs.stat(filePath);

  return {
    filePath,
    metadata,
    sizeBytes: stats.size,
  };
}

// ============================================================================
// Read Functions
// ============================================================================

/**
 * Read a full checkpoint including both metadata and data.
 *
 * @throws Error if checkpoint file doesn't exist or has invalid structure
 */
export async function readCheckpoint(
  runId: string,
  stageId: string,
  dataDir: string = getDataDir()
): Promise<Checkpoint> {
  const content = await readJson(getStageFilePath(runId, stageId, dataDir));

  const result = CheckpointSchema.safeParse(content);
  if (!result.success) {
    throw new Error(
      `Invalid checkpoint structure for ${stageId}: ${getCheckpointValidationErrors(content).join('; ')}`
    );
  }

  return result.data;
}

/**
 * Read a checkpoint and extract just the dataset.
 */
export async function readCheckpointData(
  runId: string,
  stageId: string,
  dataDir: string = getDataDir()
): Promise<Dataset> {
  const checkpoint = await readCheckpoint(runId, stageId, dataDir);
  return checkpoint.data;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate that a checkpoint has correct structure.
 *
 * @example
 * if (!validateCheckpointStructure(loaded)) {
 *   throw new Error('Invalid checkpoint');
 * }
 */
export function validateCheckpointStructure(checkpoint: unknown): checkpoint is Checkpoint {
  return CheckpointSchema.safeParse(checkpoint).success;
}

/**
 * Get detailed validation errors for a checkpoint structure.
 *
 * @returns Array of validation error messages, empty if valid
 */
export function getCheckpointValidationErrors(checkpoint: unknown): string[] {
  if (typeof checkpoint !== 'object' || checkpoint === null) {
    return ['Checkpoint must be a non-null object'];
  }

  const errors: string[] = [];

  if (!('_meta' in checkpoint) || checkpoint._meta === undefined) {
    errors.push('Missing required field: _meta');
  } else {
    const metaResult = StageMetadataSchema.safeParse(checkpoint._meta);
    if (!metaResult.success) {
      for (const issue of metaResult.error.issues) {
        errors.push(`_meta.${issue.path.join('.')}: ${issue.message}`);
      }
    }
  }

  if (!('data' in checkpoint)) {
    errors.push('Missing required field: data');
  } else {
    const dataResult = DatasetSchema.safeParse(checkpoint.data);
    if (!dataResult.success) {
      for (const issue of dataResult.error.issues) {
        errors.push(`data.${issue.path.join('.')}: ${issue.message}`);
      }
    }
  }

  return errors;
}
