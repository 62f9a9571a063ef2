/**
 * Manifest Generation Module
 *
 * Generates and manages run manifests with SHA-256 file integrity verification.
 * Each checkpointed run produces a manifest.json tracking all stage files and their hashes.
 *
 * @module pipeline/manifest
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';

import {
  buildRunManifest,
  RunManifestSchema,
  type RunManifest,
  type ManifestStageEntry,
} from '../schemas/manifest.js';
import {
  getStageFilePath,
  getManifestPath,
  getDataDir,
  atomicWriteJson,
  readJson,
  fileExists,
} from '../storage/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Stage information for manifest generation
 */
export interface StageFileInfo {
  /** Stage identifier (e.g., "04_ci_split") */
  stageId: string;
  /** Rows in the checkpointed dataset */
  rowCount: number;
  /** Cells the stage nullified; 0 when omitted */
  nullifiedCount?: number;
  /** Previous stage that fed into this one */
  upstreamStage?: string;
}

/**
 * Result of verifying a manifest's integrity
 */
export interface ManifestVerificationResult {
  /** Whether all stage hashes match */
  valid: boolean;
  /** Per-stage verification details */
  stages: Array<{
    stageId: string;
    expectedHash: string;
    actualHash: string;
    matches: boolean;
  }>;
}

/** Placeholder hash reported for a checkpoint that cannot be read */
export const MISSING_FILE_HASH = '<file_not_found>';

// ============================================================================
// Hash Calculation
// ============================================================================

/**
 * Calculate SHA-256 hash of a file's contents.
 *
 * @returns 64-character lowercase hex SHA-256 hash
 * @throws If file doesn't exist or can't be read
 */
export async function calculateFileHash(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath);
  return crypto.createHash('sha256').update(content).digest('hex');
}

// ============================================================================
// Stage Entry Creation
// ============================================================================

/**
 * Create a ManifestStageEntry from a checkpoint file.
 *
 * @throws If stage file doesn't exist or can't be read
 *
 * @example
 * ```typescript
 * const entry = await createStageEntry('20260102-143512', {
 *   stageId: '04_ci_split',
 *   rowCount: 120,
 *   upstreamStage: '03_coverage_rescaled',
 * });
 * // { stageId: '04_ci_split', sha256: 'abc123...', sizeBytes: 1234, ... }
 * ```
 */
export async function createStageEntry(
  runId: string,
  stage: StageFileInfo,
  dataDir: string = getDataDir()
): Promise<ManifestStageEntry> {
  const filePath = getStageFilePath(runId, stage.stageId, dataDir);

  const [hash, stats] = await Promise.all([calculateFileHash(filePath), fs.stat(filePath)]);

  return {
    stageId: stage.stageId,
    filename: `${stage.stageId}.json`,
    createdAt: stats.mtime.toISOString(),
    sha256: hash,
    sizeBytes: stats.size,
    rowCount: stage.rowCount,
    nullifiedCount: stage.nullifiedCount ?? 0,
    upstreamStage: stage.upstreamStage,
  };
}

// ============================================================================
// Manifest Generation
// ============================================================================

/**
 * Generate a manifest for a run from its checkpoint files.
 *
 * @param executedStages - Stages whose checkpoints were written, in order
 * @param success - Whether the run completed successfully
 */
export async function generateManifest(
  runId: string,
  executedStages: StageFileInfo[],
  success: boolean,
  options: { source?: string; dataDir?: string } = {}
): Promise<RunManifest> {
  const dataDir = options.dataDir ?? getDataDir();
  const stages: ManifestStageEntry[] = [];
  for (const stage of executedStages) {
    stages.push(await createStageEntry(runId, stage, dataDir));
  }

  return buildRunManifest({ runId, stages, success, source: options.source });
}

// ============================================================================
// Manifest Persistence
// ============================================================================

/**
 * Save a manifest to its run directory.
 *
 * @returns Path where manifest was saved
 */
export async function saveManifest(
  manifest: RunManifest,
  dataDir: string = getDataDir()
): Promise<string> {
  const manifestPath = getManifestPath(manifest.runId, dataDir);
  await atomicWriteJson(manifestPath, RunManifestSchema.parse(manifest));
  return manifestPath;
}

/**
 * Load an existing manifest from a run directory.
 *
 * @returns The loaded manifest, or null if it doesn't exist
 * @throws If the manifest exists but fails validation
 */
export async function loadManifest(
  runId: string,
  dataDir: string = getDataDir()
): Promise<RunManifest | null> {
  const manifestPath = getManifestPath(runId, dataDir);

  if (!(await fileExists(manifestPath))) {
    return null;
  }

  return RunManifestSchema.parse(await readJson(manifestPath));
}

// ============================================================================
// Manifest Verification
// ============================================================================

/**
 * Verify manifest integrity by recalculating hashes.
 *
 * @throws If manifest doesn't exist
 *
 * @example
 * ```typescript
 * const result = await verifyManifest('20260102-143512');
 * if (!result.valid) {
 *   const corrupted = result.stages.filter((s) => !s.matches);
 * }
 * ```
 */
export async function verifyManifest(
  runId: string,
  dataDir: string = getDataDir()
): Promise<ManifestVerificationResult> {
  const manifest = await loadManifest(runId, dataDir);
  if (!manifest) {
    throw new Error(`Manifest not found for run ${runId}`);
  }

  const stages: ManifestVerificationResult['stages'] = [];

  for (const stage of manifest.stages) {
    const filePath = getStageFilePath(runId, stage.stageId, dataDir);

    const actualHash = (await fileExists(filePath))
      ? await calculateFileHash(filePath)
      : MISSING_FILE_HASH;

    stages.push({
      stageId: stage.stageId,
      expectedHash: stage.sha256,
      actualHash,
      matches: actualHash === stage.sha256,
    });
  }

  return {
    valid: stages.every((stage) => stage.matches),
    stages,
  };
}
