/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  STAGE_LABELS,
  StageProgressDisplay,
  createSpinner,
  createStageProgress,
  formatDuration,
  formatStageStats,
  type StageStatus,
  type StageDisplay,
} from './progress.js';

// Run summary formatters
export {
  formatRunSummary,
  countNullified,
  formatNullificationSummary,
  formatErrorSummary,
  formatTimingBreakdown,
  formatRunStatusLine,
  type RunSummary,
} from './run-summary.js';

// Table formatters
export { formatCell, formatTable, padRight, truncate } from './table.js';

// Inspection report formatters
export { formatInspectionReport } from './inspection.js';
