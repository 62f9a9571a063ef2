/**
 * Common Zod Schemas - Shared types used across persisted files
 */

import { z } from 'zod';

// ============================================
// ISO8601 Timestamp Schema
// ============================================

/**
 * ISO8601 timestamp string (e.g., "2024-01-15T10:30:00.000Z")
 */
export const ISO8601TimestampSchema = z.string().datetime({ message: 'Must be a valid ISO8601 timestamp' });

export type ISO8601Timestamp = z.infer<typeof ISO8601TimestampSchema>;

// ============================================
// Cell and Column Schemas
// ============================================

/**
 * A single dataset cell.
 */
export const CellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/**
 * Declared column type: unknown, string, integer or decimal(p,s).
 */
export const ColumnTypeSchema = z.union([
  z.literal('unknown'),
  z.literal('string'),
  z.literal('integer'),
  z.custom<`decimal(${number},${number})`>(
    (value) => typeof value === 'string' && /^decimal\(\d+,\d+\)$/.test(value),
    { message: 'Must be unknown, string, integer or decimal(p,s)' }
  ),
]);

/**
 * Column definition.
 */
export const ColumnSchema = z.object({
  name: z.string().min(1),
  type: ColumnTypeSchema,
});

/**
 * Dataset: ordered columns plus rows keyed by column name.
 */
export const DatasetSchema = z.object({
  columns: z.array(ColumnSchema),
  rows: z.array(z.record(z.string(), CellValueSchema)),
});

export type ColumnDefinition = z.infer<typeof ColumnSchema>;
