/**
 * Stage Definition Helper
 *
 * Wraps a pure dataset transform into a pipeline Stage: checks required
 * columns, records metadata and timing, and logs nullified cells.
 *
 * @module pipeline/stage
 */

import type { Dataset } from '../dataset/types.js';
import { createStageMetadata } from '../schemas/stage.js';
import { requireColumns } from './map-stage.js';
import {
  STAGE_NAMES,
  buildStageId,
  getStageId,
  type NormalizationOptions,
  type Stage,
  type StageContext,
  type StageNumber,
  type StageResult,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * What a concrete stage provides. Everything else is derived.
 */
export interface StageDefinition {
  /** Stage number (1-5); the name follows from it */
  number: StageNumber;

  /** Columns that must be present in the input */
  requiredColumns: readonly string[];

  /** Pure transform, called only after required columns are checked */
  transform(
    input: Dataset,
    options: NormalizationOptions
  ): { dataset: Dataset; nullified: Record<string, number> };
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Build a Stage from a definition.
 *
 * @example
 * ```typescript
 * export const rescaleStage = defineStage({
 *   number: 3,
 *   requiredColumns: ['pct_coverage'],
 *   transform: (input) => applyMapStage(input, { mappings: [...] }),
 * });
 * ```
 */
export function defineStage(definition: StageDefinition): Stage {
  const name = STAGE_NAMES[definition.number];
  const id = buildStageId(definition.number, name);

  const transform = (input: Dataset, options: NormalizationOptions) => {
    requireColumns(input, definition.requiredColumns, id);
    return definition.transform(input, options);
  };

  const execute = async (
    context: StageContext,
    input: Dataset
  ): Promise<StageResult<Dataset>> => {
    const startedAt = new Date().toISOString();
    const startTime = Date.now();

    const { dataset, nullified } = transform(input, context.options);

    for (const [column, count] of Object.entries(nullified)) {
      if (count > 0) {
        context.logger?.warn(
          `${id}: ${count} value${count === 1 ? '' : 's'} in "${column}" could not be parsed and ${count === 1 ? 'was' : 'were'} set to null`
        );
      }
    }
    context.logger?.debug(`${id}: ${input.rows.length} rows in, ${dataset.rows.length} rows out`);

    const stats = { rowsIn: input.rows.length, rowsOut: dataset.rows.length, nullified };

    return {
      data: dataset,
      metadata: createStageMetadata({
        stageNumber: definition.number,
        stageName: name,
        runId: context.runId,
        upstreamStage: definition.number > 1 ? getStageId(previousStage(definition.number)) : undefined,
        stats,
      }),
      timing: {
        startedAt,
        completedAt: new Date().toISOString(),
        durationMs: Date.now() - startTime,
      },
      stats,
    };
  };

  return {
    id,
    name,
    number: definition.number,
    requiredColumns: definition.requiredColumns,
    transform,
    execute,
  };
}

function previousStage(num: StageNumber): StageNumber {
  switch (num) {
    case 5:
      return 4;
    case 4:
      return 3;
    case 3:
      return 2;
    default:
      return 1;
  }
}
