/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the storage layer.
 *
 * Directory Structure:
 * ```
 * ~/.immunization-etl/                         # Default data directory
 * ├── tables/
 * │   └── <table_name>.json                    # Persisted table (overwritten on save)
 * └── runs/
 *     └── <run_id>/                            # e.g., 20260102-143512
 *         ├── manifest.json                    # Run manifest with checkpoint hashes
 *         └── NN_stage_name.json               # Stage checkpoint files
 * ```
 *
 * Every function takes an optional `dataDir`; when omitted, `getDataDir()`
 * is used.
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';
import { TABLE_NAME_PATTERN } from '../schemas/table.js';
import { STAGE_ID_PATTERN } from '../schemas/stage.js';

/** Environment variable overriding the data directory */
export const DATA_DIR_ENV = 'IMMUNIZATION_ETL_DATA_DIR';

/** Default data directory name under the home directory */
const DEFAULT_DATA_DIR_NAME = '.immunization-etl';

/**
 * Validates an ID string to prevent path traversal.
 *
 * @throws {Error} If the ID is empty or contains `..`, `/` or `\`
 */
function validateIdSecurity(id: string, idName: string): void {
  if (!id || id.trim() === '') {
    throw new Error(`${idName} is required`);
  }
  if (id.includes('..') || id.includes('/') || id.includes('\\')) {
    throw new Error(`${idName} contains invalid characters (path traversal not allowed)`);
  }
}

/**
 * Gets the root data directory for the application.
 *
 * Uses `IMMUNIZATION_ETL_DATA_DIR` if set, otherwise `~/.immunization-etl/`.
 * A leading `~` is expanded and relative paths are resolved.
 *
 * @example
 * ```typescript
 * process.env.IMMUNIZATION_ETL_DATA_DIR = '/custom/path';
 * getDataDir(); // '/custom/path'
 * ```
 */
export function getDataDir(): string {
  const envDir = process.env[DATA_DIR_ENV];

  if (envDir) {
    return resolveDataDir(envDir);
  }

  return path.join(os.homedir(), DEFAULT_DATA_DIR_NAME);
}

/**
 * Resolve a user-supplied data directory, expanding `~`.
 */
export function resolveDataDir(dir: string): string {
  if (dir.startsWith('~')) {
    return path.join(os.homedir(), dir.slice(1));
  }
  return path.resolve(dir);
}

/**
 * Gets the tables directory.
 */
export function getTablesDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'tables');
}

/**
 * Gets the file path of a persisted table.
 *
 * @throws {Error} If the table name is not a valid table name
 * @example
 * ```typescript
 * getTablePath('ns_school_immunization');
 * // '/Users/username/.immunization-etl/tables/ns_school_immunization.json'
 * ```
 */
export function getTablePath(tableName: string, dataDir: string = getDataDir()): string {
  if (!TABLE_NAME_PATTERN.test(tableName)) {
    throw new Error(
      `Invalid table name: "${tableName}". Use lowercase letters, digits and underscores, starting with a letter.`
    );
  }
  return path.join(getTablesDir(dataDir), `${tableName}.json`);
}

/**
 * Gets the runs root directory.
 */
export function getRunsDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'runs');
}

/**
 * Gets the directory of a specific run.
 *
 * @throws {Error} If runId is empty or contains path separators
 */
export function getRunDir(runId: string, dataDir: string = getDataDir()): string {
  validateIdSecurity(runId, 'runId');
  return path.join(getRunsDir(dataDir), runId);
}

/**
 * Gets the checkpoint file path of a stage within a run.
 *
 * @throws {Error} If stageId does not match NN_stage_name
 * @example
 * ```typescript
 * getStageFilePath('20260102-143512', '04_ci_split');
 * // '.../runs/20260102-143512/04_ci_split.json'
 * ```
 */
export function getStageFilePath(
  runId: string,
  stageId: string,
  dataDir: string = getDataDir()
): string {
  if (!STAGE_ID_PATTERN.test(stageId)) {
    throw new Error(
      `Invalid stageId format: ${stageId}. Expected NN_stage_name (e.g., 04_ci_split)`
    );
  }
  return path.join(getRunDir(runId, dataDir), `${stageId}.json`);
}

/**
 * Gets the manifest path of a run.
 */
export function getManifestPath(runId: string, dataDir: string = getDataDir()): string {
  return path.join(getRunDir(runId, dataDir), 'manifest.json');
}
