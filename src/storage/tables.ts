/**
 * Table Storage Operations
 *
 * The dataset sink: one JSON file per table under `<dataDir>/tables/`.
 * Saving overwrites the whole table.
 *
 * @module storage/tables
 */

import * as fs from 'node:fs/promises';
import Papa from 'papaparse';
import type { Dataset } from '../dataset/types.js';
import { parseDecimalType } from '../dataset/types.js';
import { formatDecimal } from '../casts/numeric.js';
import { SCHEMA_VERSIONS, isCurrentVersion } from '../schemas/versions.js';
import { TableFileSchema, TableNameSchema, type TableFile } from '../schemas/table.js';
import { ConfigurationError } from '../errors/index.js';
import { atomicWriteFile, atomicWriteJson, isNotFound } from './atomic.js';
import { getDataDir, getTablePath, getTablesDir } from './paths.js';

/**
 * Options for saving a table
 */
export interface SaveTableOptions {
  /** Run that produced the table */
  runId?: string;
  /** Data directory override */
  dataDir?: string;
}

/**
 * Validate a table name.
 *
 * @throws {ConfigurationError} If the name is not a valid table name
 */
export function assertTableName(tableName: string): void {
  const result = TableNameSchema.safeParse(tableName);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid table name: "${tableName}"`,
      result.error.issues.map((issue) => issue.message)
    );
  }
}

/**
 * Save a dataset as a table, replacing any previous contents.
 *
 * @returns Path of the written table file
 *
 * @example
 * ```typescript
 * await saveTable('ns_school_immunization', dataset, { runId });
 * ```
 */
export async function saveTable(
  tableName: string,
  dataset: Dataset,
  options: SaveTableOptions = {}
): Promise<string> {
  assertTableName(tableName);
  const dataDir = options.dataDir ?? getDataDir();

  const table: TableFile = {
    schemaVersion: SCHEMA_VERSIONS.table,
    tableName,
    savedAt: new Date().toISOString(),
    runId: options.runId,
    columns: dataset.columns.map((column) => ({ name: column.name, type: column.type })),
    rowCount: dataset.rows.length,
    rows: dataset.rows.map((row) => ({ ...row })),
  };

  const filePath = getTablePath(tableName, dataDir);
  await atomicWriteJson(filePath, table);
  return filePath;
}

/**
 * Load a table and validate it.
 *
 * @throws Error if the table doesn't exist or fails validation
 */
export async function loadTable(
  tableName: string,
  dataDir: string = getDataDir()
): Promise<TableFile> {
  assertTableName(tableName);
  const filePath = getTablePath(tableName, dataDir);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new Error(`Table not found: ${tableName} (path: ${filePath})`, { cause: error });
    }
    throw error;
  }

  const table = TableFileSchema.parse(JSON.parse(content));
  if (!isCurrentVersion('table', table.schemaVersion)) {
    throw new Error(
      `Unsupported schema version ${table.schemaVersion} for table ${tableName} (expected ${SCHEMA_VERSIONS.table})`
    );
  }
  return table;
}

/**
 * Check whether a table exists.
 */
export async function tableExists(
  tableName: string,
  dataDir: string = getDataDir()
): Promise<boolean> {
  try {
    await fs.access(getTablePath(tableName, dataDir));
    return true;
  } catch {
    return false;
  }
}

/**
 * List all saved tables
 *
 * @returns Table names sorted alphabetically
 */
export async function listTables(dataDir: string = getDataDir()): Promise<string[]> {
  try {
    const entries = await fs.readdir(getTablesDir(dataDir), { withFileTypes: true });

    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
      .map((entry) => entry.name.slice(0, -'.json'.length))
      .filter((name) => TableNameSchema.safeParse(name).success)
      .sort((a, b) => a.localeCompare(b));
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }
}

/**
 * Render a dataset as CSV text.
 *
 * Decimal columns keep their fixed number of fractional digits and nulls
 * become empty cells.
 */
export function toCsv(dataset: Dataset): string {
  const fields = dataset.columns.map((column) => column.name);
  const scales = dataset.columns.map((column) => parseDecimalType(column.type)?.scale);

  const data = dataset.rows.map((row) =>
    dataset.columns.map((column, index) => {
      const value = row[column.name] ?? null;
      const scale = scales[index];
      if (value === null) {
        return '';
      }
      if (typeof value === 'number' && scale !== undefined) {
        return formatDecimal(value, scale);
      }
      return String(value);
    })
  );

  return Papa.unparse({ fields, data }, { newline: '\n' });
}

/**
 * Export a dataset to a CSV file.
 *
 * @returns Number of data rows written
 */
export async function exportCsv(dataset: Dataset, filePath: string): Promise<number> {
  await atomicWriteFile(filePath, `${toCsv(dataset)}\n`);
  return dataset.rows.length;
}
