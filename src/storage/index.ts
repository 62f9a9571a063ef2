/**
 * Storage Layer
 *
 * File-based persistence for tables, run checkpoints and manifests.
 * All write operations use atomic temp file + rename pattern.
 *
 * @module storage
 */

// Path utilities
export {
  DATA_DIR_ENV,
  getDataDir,
  resolveDataDir,
  getTablesDir,
  getTablePath,
  getRunsDir,
  getRunDir,
  getStageFilePath,
  getManifestPath,
} from './paths.js';

// Atomic operations
export {
  atomicWriteFile,
  atomicWriteJson,
  readJson,
  fileExists,
  isNotFound,
} from './atomic.js';

// Run operations
export { RUN_ID_PATTERN, generateRunId, createRunDir, listRuns } from './runs.js';

// Table operations
export {
  assertTableName,
  saveTable,
  loadTable,
  tableExists,
  listTables,
  toCsv,
  exportCsv,
  type SaveTableOptions,
} from './tables.js';
