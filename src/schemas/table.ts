/**
 * Table File Schema
 *
 * The dataset sink persists each table as a single JSON file holding the
 * column definitions and every row. Saving a table overwrites the file.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { CellValueSchema, ColumnSchema, ISO8601TimestampSchema } from './common.js';

// ============================================================================
// Table Name
// ============================================================================

/**
 * Table names: lowercase letter first, then lowercase letters, digits or `_`.
 */
export const TABLE_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

export const TableNameSchema = z
  .string()
  .regex(
    TABLE_NAME_PATTERN,
    'Table name must start with a lowercase letter and contain only lowercase letters, digits and underscores'
  );

// ============================================================================
// Table File Schema
// ============================================================================

/**
 * Persisted table.
 */
export const TableFileSchema = z
  .object({
    /** Schema version for forward compatibility */
    schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.table),

    /** Table name (matches the file name) */
    tableName: TableNameSchema,

    /** ISO8601 timestamp of the last overwrite */
    savedAt: ISO8601TimestampSchema,

    /** Run that produced the table, if known */
    runId: z.string().optional(),

    /** Ordered column definitions */
    columns: z.array(ColumnSchema),

    /** Number of rows (must equal rows.length) */
    rowCount: z.number().int().nonnegative(),

    /** Row data keyed by column name */
    rows: z.array(z.record(z.string(), CellValueSchema)),
  })
  .refine((table) => table.rowCount === table.rows.length, {
    message: 'rowCount does not match the number of rows',
    path: ['rowCount'],
  });

export type TableFile = z.infer<typeof TableFileSchema>;
