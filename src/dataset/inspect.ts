/**
 * Dataset Inspection
 *
 * Read-only summaries of a dataset: schema, value counts, duplicate keys
 * and coverage gaps between periods, groups and partitions. Works on raw
 * and canonical datasets alike; nothing here changes a dataset.
 *
 * @module dataset/inspect
 */

import { SchemaMismatchError } from '../errors/index.js';
import type { CellValue, Column, Dataset } from './types.js';
import { hasColumn } from './types.js';

// ============================================================================
// Types
// ============================================================================

/** A value and how many rows carry it */
export interface ValueCount {
  value: CellValue;
  count: number;
}

/** Distinct counts of several columns within one group */
export interface DistinctCounts {
  value: CellValue;
  distinct: Record<string, number>;
}

/** A key combination occurring more than once */
export interface DuplicateKey {
  key: CellValue[];
  count: number;
}

/** A (period, group) pair that never occurs together */
export interface MissingCombination {
  period: CellValue;
  group: CellValue;
}

/** Groups present in a period but absent from one partition of it */
export interface MissingPartitionGroups {
  period: CellValue;
  partition: CellValue;
  missing: CellValue[];
}

// ============================================================================
// Ordering
// ============================================================================

function typeRank(value: CellValue): number {
  if (value === null) return 0;
  if (typeof value === 'boolean') return 1;
  if (typeof value === 'number') return 2;
  return 3;
}

/**
 * Total order over cells: null, then booleans, numbers, strings.
 */
export function compareCells(a: CellValue, b: CellValue): number {
  const rank = typeRank(a) - typeRank(b);
  if (rank !== 0) {
    return rank;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  return 0;
}

function compareTuples(a: readonly CellValue[], b: readonly CellValue[]): number {
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const order = compareCells(a[i], b[i]);
    if (order !== 0) {
      return order;
    }
  }
  return a.length - b.length;
}

/** Map key that keeps 1 and "1" apart */
function cellKey(values: readonly CellValue[]): string {
  return JSON.stringify(values);
}

function requireInspected(dataset: Dataset, names: readonly string[]): void {
  const missing = names.filter((name) => !hasColumn(dataset, name));
  if (missing.length > 0) {
    throw new SchemaMismatchError(
      `Cannot inspect missing column(s): ${missing.join(', ')}`,
      undefined,
      missing
    );
  }
}

function cell(row: Readonly<Record<string, CellValue>>, column: string): CellValue {
  return row[column] ?? null;
}

// ============================================================================
// Schema
// ============================================================================

/**
 * Column names and types, in order.
 */
export function describeSchema(dataset: Dataset): Column[] {
  return dataset.columns.map((column) => ({ name: column.name, type: column.type }));
}

export function rowCount(dataset: Dataset): number {
  return dataset.rows.length;
}

// ============================================================================
// Counts
// ============================================================================

/**
 * Rows per value of a column, sorted by value.
 *
 * @example
 * countBy(dataset, 'year');
 * // [{ value: 2018, count: 42 }, { value: 2019, count: 40 }]
 */
export function countBy(dataset: Dataset, column: string): ValueCount[] {
  requireInspected(dataset, [column]);

  const counts = new Map<string, ValueCount>();
  for (const row of dataset.rows) {
    const value = cell(row, column);
    const key = cellKey([value]);
    const entry = counts.get(key);
    if (entry) {
      entry.count++;
    } else {
      counts.set(key, { value, count: 1 });
    }
  }

  return [...counts.values()].sort((a, b) => compareCells(a.value, b.value));
}

/**
 * Per value of `groupColumn`, the number of distinct non-null values of
 * each of `columns`. Sorted by group value.
 */
export function countDistinctBy(
  dataset: Dataset,
  groupColumn: string,
  columns: readonly string[]
): DistinctCounts[] {
  requireInspected(dataset, [groupColumn, ...columns]);

  const groups = new Map<string, { value: CellValue; seen: Map<string, Set<string>> }>();
  for (const row of dataset.rows) {
    const value = cell(row, groupColumn);
    const key = cellKey([value]);
    let group = groups.get(key);
    if (!group) {
      group = {
        value,
        seen: new Map(columns.map((column): [string, Set<string>] => [column, new Set()])),
      };
      groups.set(key, group);
    }
    for (const column of columns) {
      const other = cell(row, column);
      if (other !== null) {
        group.seen.get(column)?.add(cellKey([other]));
      }
    }
  }

  return [...groups.values()]
    .sort((a, b) => compareCells(a.value, b.value))
    .map((group) => ({
      value: group.value,
      distinct: Object.fromEntries(
        columns.map((column) => [column, group.seen.get(column)?.size ?? 0])
      ),
    }));
}

// ============================================================================
// Duplicates
// ============================================================================

/**
 * Key combinations occurring in more than one row, most frequent first.
 */
export function findDuplicateKeys(
  dataset: Dataset,
  columns: readonly string[]
): DuplicateKey[] {
  requireInspected(dataset, columns);

  const counts = new Map<string, DuplicateKey>();
  for (const row of dataset.rows) {
    const key = columns.map((column) => cell(row, column));
    const mapKey = cellKey(key);
    const entry = counts.get(mapKey);
    if (entry) {
      entry.count++;
    } else {
      counts.set(mapKey, { key, count: 1 });
    }
  }

  return [...counts.values()]
    .filter((entry) => entry.count > 1)
    .sort((a, b) => b.count - a.count || compareTuples(a.key, b.key));
}

// ============================================================================
// Coverage Gaps
// ============================================================================

function distinctValues(values: Iterable<CellValue>): CellValue[] {
  const unique = new Map<string, CellValue>();
  for (const value of values) {
    unique.set(cellKey([value]), value);
  }
  return [...unique.values()].sort(compareCells);
}

/**
 * `(period, group)` pairs absent from the dataset although the period and
 * the group each occur somewhere. Sorted by period, then group.
 *
 * @example
 * // HBV appears in 2018 only, MEN-C in 2018 and 2019
 * findMissingCombinations(dataset, 'year', 'vaccine_group');
 * // [{ period: 2019, group: 'HBV' }]
 */
export function findMissingCombinations(
  dataset: Dataset,
  periodColumn: string,
  groupColumn: string
): MissingCombination[] {
  requireInspected(dataset, [periodColumn, groupColumn]);

  const periods = distinctValues(dataset.rows.map((row) => cell(row, periodColumn)));
  const groups = distinctValues(dataset.rows.map((row) => cell(row, groupColumn)));
  const present = new Set(
    dataset.rows.map((row) => cellKey([cell(row, periodColumn), cell(row, groupColumn)]))
  );

  const missing: MissingCombination[] = [];
  for (const period of periods) {
    for (const group of groups) {
      if (!present.has(cellKey([period, group]))) {
        missing.push({ period, group });
      }
    }
  }
  return missing;
}

/**
 * For each period, the partitions lacking a group that another partition
 * of the same period has. Sorted by period, then partition; partitions
 * with nothing missing are omitted.
 */
export function findMissingGroupsByPartition(
  dataset: Dataset,
  periodColumn: string,
  groupColumn: string,
  partitionColumn: string
): MissingPartitionGroups[] {
  requireInspected(dataset, [periodColumn, groupColumn, partitionColumn]);

  interface PartitionEntry {
    partition: CellValue;
    groups: Set<string>;
  }
  interface PeriodEntry {
    period: CellValue;
    groups: CellValue[];
    partitions: Map<string, PartitionEntry>;
  }
  const byPeriod = new Map<string, PeriodEntry>();

  for (const row of dataset.rows) {
    const period = cell(row, periodColumn);
    const group = cell(row, groupColumn);
    const partition = cell(row, partitionColumn);

    const periodKey = cellKey([period]);
    let entry = byPeriod.get(periodKey);
    if (!entry) {
      entry = { period, groups: [], partitions: new Map() };
      byPeriod.set(periodKey, entry);
    }
    entry.groups.push(group);

    const partitionKey = cellKey([partition]);
    let partitionEntry = entry.partitions.get(partitionKey);
    if (!partitionEntry) {
      partitionEntry = { partition, groups: new Set() };
      entry.partitions.set(partitionKey, partitionEntry);
    }
    partitionEntry.groups.add(cellKey([group]));
  }

  const result: MissingPartitionGroups[] = [];
  const periods = [...byPeriod.values()].sort((a, b) => compareCells(a.period, b.period));
  for (const entry of periods) {
    const groups = distinctValues(entry.groups);
    const partitions = [...entry.partitions.values()].sort((a, b) =>
      compareCells(a.partition, b.partition)
    );
    for (const { partition, groups: present } of partitions) {
      const missing = groups.filter((group) => !present.has(cellKey([group])));
      if (missing.length > 0) {
        result.push({ period: entry.period, partition, missing });
      }
    }
  }
  return result;
}

// ============================================================================
// Report
// ============================================================================

/**
 * Which columns play which role in an inspection report.
 */
export interface InspectionColumns {
  /** Time period, e.g. year */
  period: string;
  /** Partition within a period, e.g. zone */
  partition: string;
  /** Fine-grained category, e.g. vaccine */
  category: string;
  /** Coarse group expected in every period, e.g. vaccine group */
  group: string;
}

export interface InspectionReport {
  schema: Column[];
  rowCount: number;
  periodCounts: ValueCount[];
  partitionCounts: ValueCount[];
  categoryCounts: ValueCount[];
  distinctPerPeriod: DistinctCounts[];
  duplicateKeys: DuplicateKey[];
  missingCombinations: MissingCombination[];
  missingGroupsByPartition: MissingPartitionGroups[];
}

/**
 * Compute every inspection over a dataset.
 *
 * @throws {SchemaMismatchError} If any of the role columns is absent
 */
export function inspectDataset(dataset: Dataset, columns: InspectionColumns): InspectionReport {
  const { period, partition, category, group } = columns;
  requireInspected(dataset, [period, partition, category, group]);

  return {
    schema: describeSchema(dataset),
    rowCount: rowCount(dataset),
    periodCounts: countBy(dataset, period),
    partitionCounts: countBy(dataset, partition),
    categoryCounts: countBy(dataset, category),
    distinctPerPeriod: countDistinctBy(dataset, period, [partition, category]),
    duplicateKeys: findDuplicateKeys(dataset, [period, partition, category]),
    missingCombinations: findMissingCombinations(dataset, period, group),
    missingGroupsByPartition: findMissingGroupsByPartition(dataset, period, group, partition),
  };
}
