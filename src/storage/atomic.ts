/**
 * Atomic File Operations for Storage Layer
 *
 * Provides atomic write operations using temp file + rename pattern,
 * plus complementary read operations.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { errorMessage } from '../errors/index.js';

/**
 * Atomically write text to a file.
 *
 * Writes to a temp file beside the target, then renames it over the target.
 * Parent directories are created as needed.
 *
 * Note: If the process crashes between temp file creation and rename,
 * an orphaned `*.tmp.*` file may remain in the target directory.
 *
 * @param filePath - Target file path
 * @param content - File content
 */
export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new Error(`Atomic write failed for ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Atomically write JSON data to a file (2-space indentation).
 *
 * @example
 * await atomicWriteJson('/path/to/file.json', { schemaVersion: 1, ... });
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, 2));
}

/**
 * Read and parse a JSON file
 *
 * @param filePath - Path to the JSON file
 * @returns Parsed JSON data
 * @throws Error if file doesn't exist or JSON is invalid
 */
export async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new Error(`File not found: ${filePath}`, { cause: error });
    }
    throw error;
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new Error(`Invalid JSON in file: ${filePath}`, { cause: error });
  }
}

/**
 * Check if a file exists (not a directory)
 *
 * @returns true if file exists, false otherwise
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Check whether an error is a Node "no such file or directory" error.
 * Matches on `code` alone: fs errors may come from another realm (as under
 * Jest) where `instanceof Error` is false.
 */
export function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
