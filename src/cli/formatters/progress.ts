/**
 * Progress Formatters
 *
 * Terminal feedback while a run is executing: an ora spinner for loading the
 * source file and a per-stage tracker that reports rows and nullified cells
 * as each normalization stage finishes.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import {
  STAGE_NAMES,
  VALID_STAGE_NUMBERS,
  type StageNumber,
  type StageStats,
} from '../../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

export type StageStatus = 'pending' | 'running' | 'completed' | 'failed' | 'skipped';

/**
 * Tracked state of one stage.
 */
export interface StageDisplay {
  number: StageNumber;
  /** Checkpoint-style stage name, e.g. `percentage_rescaler` */
  name: string;
  status: StageStatus;
  durationMs?: number;
  /** Present once the stage has completed */
  stats?: StageStats;
  error?: string;
}

/**
 * Labels shown next to each stage while it runs.
 */
export const STAGE_LABELS: Record<StageNumber, string> = {
  1: 'Canonicalize headers',
  2: 'Coerce counts',
  3: 'Rescale coverage',
  4: 'Split confidence interval',
  5: 'Group vaccines',
};

const PLAIN_MARKERS: Record<StageStatus, string> = {
  pending: '[ ]',
  running: '[*]',
  completed: '[+]',
  failed: '[X]',
  skipped: '[-]',
};

// ============================================================================
// Spinner
// ============================================================================

/**
 * Start a cyan spinner. Output goes to stderr so piped JSON stays clean.
 */
export function createSpinner(text: string): Ora {
  return ora({ text, color: 'cyan', stream: process.stderr }).start();
}

// ============================================================================
// Stage Progress Display
// ============================================================================

/**
 * Summarize stage stats as `N rows, M nullified`.
 */
export function formatStageStats(stats: StageStats): string {
  const nullified = Object.values(stats.nullified).reduce((sum, n) => sum + n, 0);
  const rows = `${stats.rowsOut} row${stats.rowsOut === 1 ? '' : 's'}`;
  return nullified > 0 ? `${rows}, ${nullified} nullified` : rows;
}

/**
 * Tracks the five normalization stages through a run.
 *
 * On a TTY each running stage gets a spinner which is resolved when the
 * stage completes or fails. Elsewhere one plain line is printed per event.
 */
export class StageProgressDisplay {
  private readonly stages = new Map<StageNumber, StageDisplay>();
  private readonly interactive: boolean;
  private spinner: Ora | null = null;

  constructor(interactive: boolean = process.stderr.isTTY === true) {
    this.interactive = interactive;
    for (const number of VALID_STAGE_NUMBERS) {
      this.stages.set(number, { number, name: STAGE_NAMES[number], status: 'pending' });
    }
  }

  startStage(stageNumber: StageNumber): void {
    this.stageAt(stageNumber).status = 'running';
    const label = `${STAGE_LABELS[stageNumber]}...`;

    if (this.interactive) {
      this.spinner = createSpinner(label);
    } else {
      this.print('running', stageNumber, label);
    }
  }

  completeStage(stageNumber: StageNumber, durationMs: number, stats?: StageStats): void {
    const stage = this.stageAt(stageNumber);
    stage.status = 'completed';
    stage.durationMs = durationMs;
    stage.stats = stats;

    const detail = [stats ? formatStageStats(stats) : null, formatDuration(durationMs)]
      .filter((part): part is string => part !== null)
      .join(', ');
    const text = `${STAGE_LABELS[stageNumber]} (${detail})`;

    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    } else {
      this.print('completed', stageNumber, text);
    }
  }

  failStage(stageNumber: StageNumber, error: string): void {
    const stage = this.stageAt(stageNumber);
    stage.status = 'failed';
    stage.error = error;
    const text = `${STAGE_LABELS[stageNumber]}: ${error}`;

    if (this.spinner) {
      this.spinner.fail(chalk.red(text));
      this.spinner = null;
    } else {
      this.print('failed', stageNumber, text);
    }
  }

  /**
   * Mark a stage as not run, e.g. beyond `--stop-after`.
   */
  skipStage(stageNumber: StageNumber): void {
    this.stageAt(stageNumber).status = 'skipped';
    if (!this.interactive) {
      this.print('skipped', stageNumber, `${STAGE_LABELS[stageNumber]} (skipped)`);
    }
  }

  getStageDisplay(stageNumber: StageNumber): StageDisplay {
    return this.stageAt(stageNumber);
  }

  getCounts(): Record<StageStatus, number> {
    const counts: Record<StageStatus, number> = {
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0,
      skipped: 0,
    };
    for (const stage of this.stages.values()) {
      counts[stage.status] += 1;
    }
    return counts;
  }

  isSuccess(): boolean {
    return this.getCounts().failed === 0;
  }

  getTotalDuration(): number {
    let total = 0;
    for (const stage of this.stages.values()) {
      total += stage.durationMs ?? 0;
    }
    return total;
  }

  private stageAt(stageNumber: StageNumber): StageDisplay {
    const stage = this.stages.get(stageNumber);
    if (!stage) {
      throw new RangeError(`Unknown stage number: ${stageNumber}`);
    }
    return stage;
  }

  private print(status: StageStatus, stageNumber: StageNumber, text: string): void {
    console.log(`${PLAIN_MARKERS[status]} Stage ${stageNumber}: ${text}`);
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration as `500ms`, `1.5s` or `1m 30s`.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds % 60)}s`;
}

export function createStageProgress(): StageProgressDisplay {
  return new StageProgressDisplay();
}
