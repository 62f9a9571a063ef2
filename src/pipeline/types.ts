/**
 * Pipeline Type Definitions
 *
 * Core interfaces for the five-stage normalization pipeline.
 * These types define the contracts between stages, the execution context,
 * and the results structure.
 *
 * @module pipeline/types
 */

import type { Dataset } from '../dataset/types.js';
import type { StageMetadata, StageStats } from '../schemas/stage.js';
import type { GroupOverrideRule } from '../stages/category-normalizer.js';

// ============================================================================
// Stage Numbers and Names
// ============================================================================

/**
 * Valid stage numbers (1-5).
 *
 * Stage numbering:
 * - 01: Header Canonicalizer
 * - 02: Numeric Coercer
 * - 03: Percentage Rescaler
 * - 04: Range Splitter
 * - 05: Category Normalizer
 */
export type StageNumber = 1 | 2 | 3 | 4 | 5;

/**
 * Union type of all stage names in the pipeline.
 * These double as checkpoint filenames.
 */
export type StageName =
  | 'headers_canonicalized'
  | 'counts_coerced'
  | 'coverage_rescaled'
  | 'ci_split'
  | 'vaccine_grouped';

/** Number of stages in the pipeline */
export const TOTAL_STAGES = 5;

/**
 * Mapping from stage number to stage name.
 */
export const STAGE_NAMES: Record<StageNumber, StageName> = {
  1: 'headers_canonicalized',
  2: 'counts_coerced',
  3: 'coverage_rescaled',
  4: 'ci_split',
  5: 'vaccine_grouped',
} as const;

/**
 * Mapping from stage name to stage number.
 */
export const STAGE_NUMBERS: Record<StageName, StageNumber> = {
  headers_canonicalized: 1,
  counts_coerced: 2,
  coverage_rescaled: 3,
  ci_split: 4,
  vaccine_grouped: 5,
} as const;

/** All stage numbers in execution order */
export const VALID_STAGE_NUMBERS: readonly StageNumber[] = [1, 2, 3, 4, 5];

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline stages.
 * Allows stages to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Stage Context
// ============================================================================

/**
 * Options that change what the stages produce.
 */
export interface NormalizationOptions {
  /**
   * Group label overrides applied after the default `" - "` split,
   * in order. Defaults to the built-in rules.
   */
  groupOverrides?: readonly GroupOverrideRule[];
}

/**
 * Runtime context passed to each pipeline stage during execution.
 */
export interface StageContext {
  /** Run identifier (format: YYYYMMDD-HHMMSS) */
  runId: string;

  /** Base data directory for checkpoints and tables */
  dataDir: string;

  /** Options affecting stage output */
  options: NormalizationOptions;

  /** Source the input dataset was read from, recorded in the run manifest */
  source?: string;

  /** Optional logger for stage output */
  logger?: Logger;
}

// ============================================================================
// Stage Result
// ============================================================================

export type { StageStats };

/**
 * Result returned by a stage after execution.
 *
 * @typeParam T - The type of the stage output data
 */
export interface StageResult<T> {
  /** The stage output data */
  data: T;

  /** Standard metadata for the stage output */
  metadata: StageMetadata;

  /** Execution timing information */
  timing: {
    /** ISO8601 timestamp when stage started */
    startedAt: string;

    /** ISO8601 timestamp when stage completed */
    completedAt: string;

    /** Duration in milliseconds */
    durationMs: number;
  };

  /** Row and nullification counts */
  stats: StageStats;
}

// ============================================================================
// Stage Interface
// ============================================================================

/**
 * Interface that all pipeline stages implement.
 * Each stage consumes the previous stage's dataset and returns a new one.
 */
export interface Stage {
  /**
   * Stage identifier in format NN_stage_name.
   * @example "04_ci_split"
   */
  id: string;

  /** Stage name */
  name: StageName;

  /** Numeric stage number (1-5) */
  number: StageNumber;

  /** Columns that must be present in the input */
  requiredColumns: readonly string[];

  /**
   * Transform a dataset without touching I/O. Pure: the input is not modified.
   *
   * @param input - Output of the upstream stage
   * @param options - Options affecting stage output
   * @returns Output dataset and per-column nullification counts
   */
  transform(input: Dataset, options: NormalizationOptions): {
    dataset: Dataset;
    nullified: Record<string, number>;
  };

  /**
   * Execute the stage with the given context and input, recording
   * metadata, timing and counts.
   */
  execute(context: StageContext, input: Dataset): Promise<StageResult<Dataset>>;
}

// ============================================================================
// Execution Options
// ============================================================================

/**
 * Options for pipeline execution.
 */
export interface ExecuteOptions {
  /**
   * If true, list what would run without executing.
   */
  dryRun?: boolean;

  /**
   * Stop execution after this stage number.
   */
  stopAfterStage?: StageNumber;

  /**
   * If true, write every stage output as a checkpoint file and a run
   * manifest under the run directory.
   */
  checkpoint?: boolean;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Format a stage number as a two-digit string with leading zero.
 * @returns Two-digit string (e.g., "01", "05")
 */
export function formatStageNumber(num: StageNumber): string {
  return num.toString().padStart(2, '0');
}

/**
 * Build a stage ID from number and name.
 * @returns Stage ID in format NN_stage_name
 */
export function buildStageId(num: StageNumber, name: StageName): string {
  return `${formatStageNumber(num)}_${name}`;
}

/**
 * Get the stage ID for a stage number.
 */
export function getStageId(num: StageNumber): string {
  return buildStageId(num, STAGE_NAMES[num]);
}

/**
 * Check if a value is a valid stage number.
 */
export function isValidStageNumber(value: unknown): value is StageNumber {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= TOTAL_STAGES;
}

/**
 * Check if a value is a valid stage name.
 */
export function isValidStageName(value: unknown): value is StageName {
  return typeof value === 'string' && Object.hasOwn(STAGE_NUMBERS, value);
}

/**
 * Resolve a user-supplied stage reference to a stage number.
 *
 * Accepts a number ("3", "03"), a name ("coverage_rescaled") or a
 * stage ID ("03_coverage_rescaled").
 *
 * @returns The stage number, or null if the reference matches no stage
 */
export function parseStageReference(reference: string): StageNumber | null {
  const trimmed = reference.trim();

  if (/^\d+$/.test(trimmed)) {
    const num = parseInt(trimmed, 10);
    return isValidStageNumber(num) ? num : null;
  }

  if (isValidStageName(trimmed)) {
    return STAGE_NUMBERS[trimmed];
  }

  const match = /^(\d{2})_([a-z_]+)$/.exec(trimmed);
  if (match) {
    const num = parseInt(match[1], 10);
    if (isValidStageNumber(num) && STAGE_NAMES[num] === match[2]) {
      return num;
    }
  }

  return null;
}
