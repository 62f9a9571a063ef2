/**
 * Checkpoint Metadata Schema
 *
 * A checkpoint file is `{ _meta, data }`: the dataset a stage produced plus
 * the record of which run and stage produced it and what the stage did to
 * the rows it received.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema } from './common.js';

// ============================================================================
// Stage IDs
// ============================================================================

/** Two-digit stage number, underscore, snake_case name: `04_ci_split` */
export const STAGE_ID_PATTERN = /^\d{2}_[a-z_]+$/;

export const StageIdSchema = z
  .string()
  .regex(STAGE_ID_PATTERN, 'Stage ID must look like "04_ci_split"');

/**
 * Stage number encoded in a stage ID.
 * @example parseStageNumber("04_ci_split") // 4
 */
export function parseStageNumber(stageId: string): number {
  const match = /^(\d{2})_/.exec(stageId);
  if (!match) {
    throw new Error(`Invalid stage ID format: ${stageId}`);
  }
  return Number(match[1]);
}

// ============================================================================
// Stage Stats
// ============================================================================

export const StageStatsSchema = z.object({
  rowsIn: z.number().int().nonnegative(),
  rowsOut: z.number().int().nonnegative(),
  /**
   * Per written column, cells that became null although their source was
   * non-null. Columns with no such cells may be absent or zero.
   */
  nullified: z.record(z.string(), z.number().int().nonnegative()),
});

export type StageStats = z.infer<typeof StageStatsSchema>;

// ============================================================================
// Metadata
// ============================================================================

export const StageMetadataSchema = z.object({
  stageId: StageIdSchema,
  stageNumber: z.number().int().min(1).max(5),
  /** Name part of the ID, e.g. `ci_split` */
  stageName: z.string().min(1),
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.stage),
  runId: z.string().min(1),
  createdAt: ISO8601TimestampSchema,
  /** ID of the stage whose output this one consumed; absent for stage 1 */
  upstreamStage: StageIdSchema.optional(),
  stats: StageStatsSchema,
});

export type StageMetadata = z.infer<typeof StageMetadataSchema>;

/**
 * Checkpoint file shape for a given payload schema.
 */
export const StageOutputSchema = <T extends z.ZodTypeAny>(dataSchema: T) =>
  z.object({
    _meta: StageMetadataSchema,
    data: dataSchema,
  });

/**
 * Build the `_meta` block for a stage that just finished. The stage ID is
 * derived from the number and name.
 */
export function createStageMetadata(params: {
  stageNumber: number;
  stageName: string;
  runId: string;
  stats: StageStats;
  upstreamStage?: string;
}): StageMetadata {
  return {
    stageId: `${String(params.stageNumber).padStart(2, '0')}_${params.stageName}`,
    stageNumber: params.stageNumber,
    stageName: params.stageName,
    schemaVersion: SCHEMA_VERSIONS.stage,
    runId: params.runId,
    createdAt: new Date().toISOString(),
    upstreamStage: params.upstreamStage,
    stats: params.stats,
  };
}
