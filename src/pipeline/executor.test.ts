/**
 * Tests for the pipeline executor
 *
 * Runs the real normalization stages against a temporary data directory.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { createDataset, type Dataset } from '../dataset/types.js';
import { NORMALIZATION_STAGES } from '../stages/index.js';
import { numericCoercerStage } from '../stages/numeric-coercer.js';
import { getRunDir } from '../storage/paths.js';
import { createPipelineExecutor, PipelineExecutor } from './executor.js';
import { readCheckpointData } from './checkpoint.js';
import { loadManifest, verifyManifest } from './manifest.js';
import type { Logger, StageContext } from './types.js';

const RUN_ID = '20260102-143512';

function rawDataset(): Dataset {
  return createDataset(
    ['Year', 'Zone', 'Vaccine', '# Immunized', '# Eligible', '% Coverage', '95% CI'],
    [
      {
        Year: 2018,
        Zone: 'Central',
        Vaccine: 'HBV - Dose 1',
        '# Immunized': '1,050',
        '# Eligible': '1,200',
        '% Coverage': 0.875,
        '95% CI': '82.0-92.0',
      },
      {
        Year: 2018,
        Zone: 'Northern',
        Vaccine: 'MEN-C-ACYW135',
        '# Immunized': 'n/a',
        '# Eligible': '900',
        '% Coverage': 0.9,
        '95% CI': '85.0',
      },
    ]
  );
}

function silentLogger(): Logger {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('PipelineExecutor', () => {
  let dataDir: string;
  let context: StageContext;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'executor-test-'));
    context = { runId: RUN_ID, dataDir, options: {}, source: 'coverage.csv', logger: silentLogger() };
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  // ==========================================================================
  // Registration
  // ==========================================================================

  describe('registration', () => {
    it('registers all five stages', () => {
      const executor = createPipelineExecutor(NORMALIZATION_STAGES);

      expect(executor.isComplete()).toBe(true);
      expect(executor.getAllStages().map((stage) => stage.number)).toEqual([1, 2, 3, 4, 5]);
    });

    it('reports missing stages', () => {
      const executor = createPipelineExecutor([numericCoercerStage]);

      expect(executor.isComplete()).toBe(false);
      expect(executor.getMissingStages()).toEqual([1, 3, 4, 5]);
      expect(executor.getStage(2)).toBe(numericCoercerStage);
    });

    it('rejects a duplicate stage number', () => {
      const executor = createPipelineExecutor([numericCoercerStage]);

      expect(() => executor.registerStage(numericCoercerStage)).toThrow(
        'Stage 2 is already registered (02_counts_coerced)'
      );
    });

    it('clears stages', () => {
      const executor = createPipelineExecutor(NORMALIZATION_STAGES);
      executor.clear();
      expect(executor.getAllStages()).toEqual([]);
    });
  });

  // ==========================================================================
  // Execution
  // ==========================================================================

  describe('execute', () => {
    it('runs every stage and collects stats', async () => {
      const executor = createPipelineExecutor(NORMALIZATION_STAGES);

      const result = await executor.execute(context, rawDataset());

      expect(result.success).toBe(true);
      expect(result.dryRun).toBe(false);
      expect(result.stagesExecuted).toEqual(NORMALIZATION_STAGES.map((stage) => stage.id));
      expect(result.finalStage).toBe('05_vaccine_grouped');
      expect(result.errors).toEqual([]);
      expect(result.manifestPath).toBeUndefined();
      expect(result.output?.rows.map((row) => row.vaccine_group)).toEqual(['HBV', 'MEN-C']);
      expect(result.stats['02_counts_coerced']).toEqual({
        rowsIn: 2,
        rowsOut: 2,
        nullified: { no_immunized: 1, no_eligible: 0 },
      });
      expect(Object.keys(result.timing.perStage)).toHaveLength(5);
    });

    it('logs a warning for nullified cells', async () => {
      const executor = createPipelineExecutor(NORMALIZATION_STAGES);

      await executor.execute(context, rawDataset());

      expect(context.logger?.warn).toHaveBeenCalledWith(
        '02_counts_coerced: 1 value in "no_immunized" could not be parsed and was set to null'
      );
      expect(context.logger?.warn).toHaveBeenCalledWith(
        '04_ci_split: 1 value in "upper_95_pct_ci" could not be parsed and was set to null'
      );
    });

    it('stops after the requested stage', async () => {
      const executor = createPipelineExecutor(NORMALIZATION_STAGES);

      const result = await executor.execute(context, rawDataset(), { stopAfterStage: 3 });

      expect(result.stagesExecuted).toEqual([
        '01_headers_canonicalized',
        '02_counts_coerced',
        '03_coverage_rescaled',
      ]);
      expect(result.output?.columns.map((column) => column.name)).toContain('95_pct_ci');
    });

    it('plans without executing on a dry run', async () => {
      const executor = createPipelineExecutor(NORMALIZATION_STAGES);
      const planned: string[] = [];
      const started: string[] = [];
      executor.setCallbacks({
        onStagePlanned: (stageId) => planned.push(stageId),
        onStageStart: (stageId) => started.push(stageId),
      });

      const result = await executor.execute(context, rawDataset(), { dryRun: true, checkpoint: true });

      expect(result.dryRun).toBe(true);
      expect(result.output).toBeNull();
      expect(planned).toHaveLength(5);
      expect(started).toEqual([]);
      expect(result.manifestPath).toBeUndefined();
      await expect(fs.access(getRunDir(RUN_ID, dataDir))).rejects.toThrow();
    });

    it('records the failing stage and keeps the last good output', async () => {
      const executor = createPipelineExecutor(NORMALIZATION_STAGES);
      const failed: string[] = [];
      executor.setCallbacks({ onStageError: (stageId) => failed.push(stageId) });
      const input = createDataset(['Year', 'Zone', 'Vaccine'], [{ Year: 2018, Zone: 'Central', Vaccine: 'HBV' }]);

      const result = await executor.execute(context, input);

      expect(result.success).toBe(false);
      expect(result.stagesExecuted).toEqual(['01_headers_canonicalized']);
      expect(result.finalStage).toBe('01_headers_canonicalized');
      expect(result.output?.columns.map((column) => column.name)).toEqual(['year', 'zone', 'vaccine']);
      expect(failed).toEqual(['02_counts_coerced']);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].stageId).toBe('02_counts_coerced');
      expect(result.errors[0].error).toContain('no_immunized, no_eligible');
    });

    it('refuses to run with a missing stage', async () => {
      const executor = new PipelineExecutor();
      executor.registerStage(numericCoercerStage);

      await expect(executor.execute(context, rawDataset())).rejects.toThrow(
        'Stage 1 (01_headers_canonicalized) not registered. Call registerStage() first.'
      );
    });
  });

  // ==========================================================================
  // Checkpoints
  // ==========================================================================

  describe('checkpoints', () => {
    it('writes one checkpoint per stage and a verifiable manifest', async () => {
      const executor = createPipelineExecutor(NORMALIZATION_STAGES);

      const result = await executor.execute(context, rawDataset(), { checkpoint: true });

      expect(result.manifestPath).toBe(path.join(dataDir, 'runs', RUN_ID, 'manifest.json'));

      const files = (await fs.readdir(getRunDir(RUN_ID, dataDir))).sort();
      expect(files).toEqual([
        '01_headers_canonicalized.json',
        '02_counts_coerced.json',
        '03_coverage_rescaled.json',
        '04_ci_split.json',
        '05_vaccine_grouped.json',
        'manifest.json',
      ]);

      const manifest = await loadManifest(RUN_ID, dataDir);
      expect(manifest?.success).toBe(true);
      expect(manifest?.source).toBe('coverage.csv');
      expect(manifest?.finalStage).toBe('05_vaccine_grouped');
      expect(manifest?.stages.map((stage) => stage.rowCount)).toEqual([2, 2, 2, 2, 2]);
      expect(manifest?.stages[3].upstreamStage).toBe('03_coverage_rescaled');

      const verification = await verifyManifest(RUN_ID, dataDir);
      expect(verification.valid).toBe(true);
    });

    it('checkpoints hold the stage output', async () => {
      const executor = createPipelineExecutor(NORMALIZATION_STAGES);

      const result = await executor.execute(context, rawDataset(), { checkpoint: true });
      const last = await readCheckpointData(RUN_ID, '05_vaccine_grouped', dataDir);

      expect(last).toEqual(result.output);
    });

    it('records a failed run in the manifest', async () => {
      const executor = createPipelineExecutor(NORMALIZATION_STAGES);
      const input = createDataset(['Year'], [{ Year: 2018 }]);

      const result = await executor.execute(context, input, { checkpoint: true });
      const manifest = await loadManifest(RUN_ID, dataDir);

      expect(result.success).toBe(false);
      expect(manifest?.success).toBe(false);
      expect(manifest?.stagesExecuted).toEqual(['01_headers_canonicalized']);
    });
  });
});
