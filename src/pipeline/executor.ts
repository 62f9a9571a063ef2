/**
 * Pipeline Executor
 *
 * Manages stage registration and executes the five normalization stages
 * in order.
 *
 * Key features:
 * - Stage registration and validation
 * - Per-stage timing and nullification counts
 * - Stop after any stage
 * - Dry-run mode
 * - Optional checkpoints with a SHA-256 run manifest
 *
 * @module pipeline/executor
 */

import type { Dataset } from '../dataset/types.js';
import { errorMessage } from '../errors/index.js';
import {
  TOTAL_STAGES,
  VALID_STAGE_NUMBERS,
  getStageId,
  isValidStageNumber,
  type Stage,
  type StageContext,
  type StageNumber,
  type StageResult,
  type StageStats,
  type ExecuteOptions,
} from './types.js';
import { writeCheckpoint } from './checkpoint.js';
import { generateManifest, saveManifest, type StageFileInfo } from './manifest.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Timing information for pipeline execution
 */
export interface PipelineTiming {
  /** ISO8601 timestamp when pipeline started */
  startedAt: string;
  /** ISO8601 timestamp when pipeline completed */
  completedAt: string;
  /** Total duration in milliseconds */
  durationMs: number;
  /** Duration per stage in milliseconds */
  perStage: Record<string, number>;
}

/**
 * Error record for a stage failure
 */
export interface StageError {
  /** Stage ID where error occurred */
  stageId: string;
  /** Error message */
  error: string;
}

/**
 * Result of a pipeline execution
 */
export interface PipelineResult {
  /** Whether every planned stage completed */
  success: boolean;
  /** Whether this was a dry run (nothing executed) */
  dryRun: boolean;
  /** Stage IDs that were executed, or planned in a dry run */
  stagesExecuted: string[];
  /** The final stage ID that completed */
  finalStage: string;
  /** Output of the final completed stage; null on dry run or first-stage failure */
  output: Dataset | null;
  /** Row and nullification counts per executed stage */
  stats: Record<string, StageStats>;
  /** Timing information */
  timing: PipelineTiming;
  /** Errors encountered during execution */
  errors: StageError[];
  /** Path of the run manifest, when checkpoints were written */
  manifestPath?: string;
}

/**
 * Callback for stage lifecycle events
 */
export interface ExecutorCallbacks {
  /** Called when a stage starts */
  onStageStart?: (stageId: string, stageNumber: StageNumber) => void;
  /** Called when a stage completes successfully */
  onStageComplete?: (stageId: string, result: StageResult<Dataset>) => void;
  /** Called when a stage fails */
  onStageError?: (stageId: string, error: Error) => void;
  /** Called for each stage a dry run would execute */
  onStagePlanned?: (stageId: string, stageNumber: StageNumber) => void;
}

// ============================================================================
// Pipeline Executor Class
// ============================================================================

/**
 * Pipeline executor that manages stage execution.
 *
 * @example
 * ```typescript
 * const executor = new PipelineExecutor();
 * executor.registerStages(NORMALIZATION_STAGES);
 *
 * const result = await executor.execute(context, dataset, {
 *   checkpoint: true,
 *   stopAfterStage: 4,
 * });
 * ```
 */
export class PipelineExecutor {
  private stages: Map<StageNumber, Stage> = new Map();
  private callbacks: ExecutorCallbacks = {};

  // ==========================================================================
  // Stage Registration
  // ==========================================================================

  /**
   * Register a stage with the executor.
   *
   * @throws Error if stage number is invalid or already registered
   */
  registerStage(stage: Stage): void {
    if (!isValidStageNumber(stage.number)) {
      throw new Error(
        `Invalid stage number ${stage.number} for stage ${stage.id}. Must be 1-${TOTAL_STAGES}.`
      );
    }

    const existing = this.stages.get(stage.number);
    if (existing) {
      throw new Error(`Stage ${stage.number} is already registered (${existing.id})`);
    }

    this.stages.set(stage.number, stage);
  }

  /**
   * Register multiple stages.
   */
  registerStages(stages: readonly Stage[]): void {
    for (const stage of stages) {
      this.registerStage(stage);
    }
  }

  /**
   * Get a registered stage by number.
   */
  getStage(number: StageNumber): Stage | undefined {
    return this.stages.get(number);
  }

  /**
   * Get all registered stages sorted by number.
   */
  getAllStages(): Stage[] {
    return Array.from(this.stages.values()).sort((a, b) => a.number - b.number);
  }

  /**
   * Check if all stages are registered.
   */
  isComplete(): boolean {
    return this.getMissingStages().length === 0;
  }

  /**
   * Get list of missing stage numbers.
   */
  getMissingStages(): StageNumber[] {
    return VALID_STAGE_NUMBERS.filter((num) => !this.stages.has(num));
  }

  /**
   * Set event callbacks for stage lifecycle.
   */
  setCallbacks(callbacks: ExecutorCallbacks): void {
    this.callbacks = callbacks;
  }

  // ==========================================================================
  // Pipeline Execution
  // ==========================================================================

  /**
   * Execute the pipeline from stage 1.
   *
   * Stops at the first failing stage; the error is recorded against it and
   * `output` holds the last successful stage's dataset.
   *
   * @throws Error if a stage up to `stopAfterStage` is not registered
   */
  async execute(
    context: StageContext,
    input: Dataset,
    options: ExecuteOptions = {}
  ): Promise<PipelineResult> {
    const startedAt = new Date().toISOString();
    const startTime = Date.now();
    const perStage: Record<string, number> = {};
    const stats: Record<string, StageStats> = {};
    const executed: string[] = [];
    const errors: StageError[] = [];
    const checkpoints: StageFileInfo[] = [];

    const stopAfter = options.stopAfterStage ?? TOTAL_STAGES;
    const planned = this.planStages(stopAfter);

    let current = input;
    let output: Dataset | null = null;
    let finalStage = '';

    for (const stage of planned) {
      if (options.dryRun) {
        executed.push(stage.id);
        finalStage = stage.id;
        this.callbacks.onStagePlanned?.(stage.id, stage.number);
        continue;
      }

      const stageStart = Date.now();
      this.callbacks.onStageStart?.(stage.id, stage.number);

      try {
        const result = await stage.execute(context, current);

        if (options.checkpoint) {
          await writeCheckpoint(result.metadata, result.data, context.dataDir);
          checkpoints.push({
            stageId: stage.id,
            rowCount: result.data.rows.length,
            nullifiedCount: Object.values(result.stats.nullified).reduce((sum, n) => sum + n, 0),
            upstreamStage: result.metadata.upstreamStage,
          });
        }

        current = result.data;
        output = result.data;
        stats[stage.id] = result.stats;
        executed.push(stage.id);
        finalStage = stage.id;
        perStage[stage.id] = Date.now() - stageStart;

        this.callbacks.onStageComplete?.(stage.id, result);
      } catch (error) {
        perStage[stage.id] = Date.now() - stageStart;
        errors.push({ stageId: stage.id, error: errorMessage(error) });
        this.callbacks.onStageError?.(
          stage.id,
          error instanceof Error ? error : new Error(errorMessage(error))
        );
        break;
      }
    }

    const success = errors.length === 0;

    let manifestPath: string | undefined;
    if (options.checkpoint && !options.dryRun && checkpoints.length > 0) {
      const manifest = await generateManifest(context.runId, checkpoints, success, {
        source: context.source,
        dataDir: context.dataDir,
      });
      manifestPath = await saveManifest(manifest, context.dataDir);
      context.logger?.debug(`Manifest written to ${manifestPath}`);
    }

    return {
      success,
      dryRun: options.dryRun ?? false,
      stagesExecuted: executed,
      finalStage,
      output,
      stats,
      timing: {
        startedAt,
        completedAt: new Date().toISOString(),
        durationMs: Date.now() - startTime,
        perStage,
      },
      errors,
      manifestPath,
    };
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  /**
   * Stages from 1 through `stopAfter`, in order.
   *
   * @throws Error if any of them is not registered
   */
  private planStages(stopAfter: StageNumber): Stage[] {
    return VALID_STAGE_NUMBERS.filter((num) => num <= stopAfter).map((num) => {
      const stage = this.stages.get(num);
      if (!stage) {
        throw new Error(
          `Stage ${num} (${getStageId(num)}) not registered. Call registerStage() first.`
        );
      }
      return stage;
    });
  }

  /**
   * Clear all registered stages and callbacks.
   */
  clear(): void {
    this.stages.clear();
    this.callbacks = {};
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create a new PipelineExecutor instance, optionally with stages registered.
 */
export function createPipelineExecutor(stages: readonly Stage[] = []): PipelineExecutor {
  const executor = new PipelineExecutor();
  executor.registerStages(stages);
  return executor;
}
