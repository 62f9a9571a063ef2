/**
 * Run Manifest Schema
 *
 * `manifest.json` sits beside the checkpoints of a run and records, per
 * stage file, its SHA-256 digest, size and row count. Verification recomputes
 * the digests to detect checkpoints edited or truncated after the run.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { ISO8601TimestampSchema } from './common.js';
import { StageIdSchema } from './stage.js';

export const ManifestStageEntrySchema = z.object({
  stageId: StageIdSchema,
  /** Checkpoint file name relative to the run directory */
  filename: z.string().min(1),
  /** Checkpoint modification time */
  createdAt: ISO8601TimestampSchema,
  sha256: z.string().regex(/^[a-f0-9]{64}$/, 'Must be a valid SHA-256 hash'),
  sizeBytes: z.number().int().nonnegative(),
  rowCount: z.number().int().nonnegative(),
  /** Cells the stage set to null from a non-null source */
  nullifiedCount: z.number().int().nonnegative().default(0),
  upstreamStage: StageIdSchema.optional(),
});

export type ManifestStageEntry = z.infer<typeof ManifestStageEntrySchema>;

export const RunManifestSchema = z
  .object({
    schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.manifest),
    runId: z.string().min(1),
    /** Input file of the run, when it came from disk */
    source: z.string().optional(),
    createdAt: ISO8601TimestampSchema,
    stages: z.array(ManifestStageEntrySchema),
    stagesExecuted: z.array(StageIdSchema),
    /** Last stage with a checkpoint; empty when none was written */
    finalStage: z.string(),
    success: z.boolean(),
  })
  .refine(
    (manifest) =>
      manifest.stages.length === manifest.stagesExecuted.length &&
      manifest.stages.every((entry, index) => entry.stageId === manifest.stagesExecuted[index]),
    { message: 'stagesExecuted must list the stage entries in order', path: ['stagesExecuted'] }
  );

export type RunManifest = z.infer<typeof RunManifestSchema>;

/**
 * Assemble a manifest from stage entries already in execution order.
 */
export function buildRunManifest(params: {
  runId: string;
  stages: ManifestStageEntry[];
  success: boolean;
  source?: string;
}): RunManifest {
  const last = params.stages[params.stages.length - 1];
  return {
    schemaVersion: SCHEMA_VERSIONS.manifest,
    runId: params.runId,
    source: params.source,
    createdAt: new Date().toISOString(),
    stages: params.stages,
    stagesExecuted: params.stages.map((entry) => entry.stageId),
    finalStage: last ? last.stageId : '',
    success: params.success,
  };
}

/**
 * Sum of nullified cells across every stage of a manifest.
 */
export function totalNullified(manifest: RunManifest): number {
  return manifest.stages.reduce((sum, entry) => sum + entry.nullifiedCount, 0);
}
