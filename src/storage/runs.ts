/**
 * Run Storage Operations
 *
 * Run identifiers and run directories for checkpointed executions.
 *
 * @module storage/runs
 */

import * as fs from 'node:fs/promises';
import { getRunsDir, getRunDir, getDataDir } from './paths.js';
import { isNotFound } from './atomic.js';

/** Run IDs: YYYYMMDD-HHMMSS */
export const RUN_ID_PATTERN = /^\d{8}-\d{6}$/;

/**
 * Generate a run ID from a timestamp (local time).
 *
 * @example generateRunId(new Date(2026, 0, 2, 14, 35, 12)) // '20260102-143512'
 */
export function generateRunId(date: Date = new Date()): string {
  const pad = (value: number) => value.toString().padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}

/**
 * Create run directory structure
 *
 * @returns The run directory path
 */
export async function createRunDir(
  runId: string,
  dataDir: string = getDataDir()
): Promise<string> {
  const runDir = getRunDir(runId, dataDir);
  await fs.mkdir(runDir, { recursive: true });
  return runDir;
}

/**
 * List all run IDs
 *
 * @returns Run IDs sorted descending (newest first)
 */
export async function listRuns(dataDir: string = getDataDir()): Promise<string[]> {
  try {
    const entries = await fs.readdir(getRunsDir(dataDir), { withFileTypes: true });

    return entries
      .filter((entry) => entry.isDirectory() && RUN_ID_PATTERN.test(entry.name))
      .map((entry) => entry.name)
      .sort((a, b) => b.localeCompare(a));
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }
}
