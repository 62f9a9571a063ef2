/**
 * CSV Dataset Source
 *
 * Loads a delimited text file into a Dataset. Cells are typed one at a
 * time: the loader never infers a column type, so a column may mix numbers
 * and strings until a stage casts it.
 *
 * @module dataset/csv
 */

import * as fs from 'node:fs/promises';
import Papa from 'papaparse';
import { DatasetSourceError, errorMessage } from '../errors/index.js';
import type { CellValue, Dataset, Row } from './types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for parsing CSV text.
 */
export interface CsvParseOptions {
  /** Field delimiter (default `,`) */
  delimiter?: string;
  /**
   * Type plain decimal literals as numbers (default true). When false every
   * non-empty cell stays a string.
   */
  typed?: boolean;
}

const BYTE_ORDER_MARK = '\uFEFF';

/** Optional sign, digits, optional fraction. No exponent, no separators. */
const DECIMAL_LITERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

// ============================================================================
// Cell Typing
// ============================================================================

/**
 * Type a single raw cell.
 *
 * @example
 * typeCell('')          // null
 * typeCell('0.873')     // 0.873
 * typeCell('1,200')     // '1,200'
 * typeCell('82.0-92.0') // '82.0-92.0'
 */
export function typeCell(raw: string, typed = true): CellValue {
  if (raw === '') {
    return null;
  }
  if (typed) {
    const trimmed = raw.trim();
    if (DECIMAL_LITERAL.test(trimmed)) {
      return Number(trimmed);
    }
  }
  return raw;
}

/**
 * Blank header cells (a trailing delimiter, an unlabelled column) are
 * named by position: `_c0`, `_c1`, ...
 */
function headerName(raw: string, index: number): string {
  return raw.trim() === '' ? `_c${index}` : raw;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse CSV text with a header row into a Dataset.
 *
 * @param source - Label used in error messages (usually the file path)
 * Blank header cells get positional names (see {@link headerName}).
 *
 * @throws {DatasetSourceError} On malformed quoting, a missing header row
 *   or duplicate header names
 */
export function parseCsvDataset(
  text: string,
  options: CsvParseOptions = {},
  source?: string
): Dataset {
  const input = text.startsWith(BYTE_ORDER_MARK) ? text.slice(1) : text;
  const typed = options.typed ?? true;

  const parsed = Papa.parse<string[]>(input, {
    header: false,
    delimiter: options.delimiter ?? ',',
    skipEmptyLines: true,
  });

  const quoteError = parsed.errors.find((error) => error.type === 'Quotes');
  if (quoteError) {
    const line = quoteError.row === undefined ? '?' : String(quoteError.row + 1);
    throw new DatasetSourceError(
      `Malformed CSV${source ? ` in ${source}` : ''} at row ${line}: ${quoteError.message}`,
      source
    );
  }

  const [rawHeader, ...records] = parsed.data;
  if (!rawHeader) {
    throw new DatasetSourceError(
      `CSV${source ? ` ${source}` : ''} has no header row`,
      source
    );
  }
  const header = rawHeader.map(headerName);

  const seen = new Set<string>();
  for (const name of header) {
    if (seen.has(name)) {
      throw new DatasetSourceError(`Duplicate column "${name}" in CSV header`, source);
    }
    seen.add(name);
  }

  const rows: Row[] = records.map((record) => {
    const row: Record<string, CellValue> = {};
    header.forEach((name, index) => {
      const raw = record[index];
      row[name] = raw === undefined ? null : typeCell(raw, typed);
    });
    return row;
  });

  return {
    columns: header.map((name) => ({ name, type: 'unknown' as const })),
    rows,
  };
}

/**
 * Read and parse a CSV file.
 *
 * @throws {DatasetSourceError} If the file cannot be read or parsed
 *
 * @example
 * ```typescript
 * const dataset = await readCsvDataset('./data/immunization.csv');
 * ```
 */
export async function readCsvDataset(
  filePath: string,
  options: CsvParseOptions = {}
): Promise<Dataset> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new DatasetSourceError(
      `Cannot read dataset file ${filePath}: ${errorMessage(error)}`,
      filePath,
      { cause: error }
    );
  }

  return parseCsvDataset(text, options, filePath);
}
