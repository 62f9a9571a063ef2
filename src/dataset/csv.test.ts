/**
 * Tests for the CSV dataset source
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { DatasetSourceError } from '../errors/index.js';
import { parseCsvDataset, readCsvDataset, typeCell } from './csv.js';

const SAMPLE = [
  'Year,Zone,Vaccine,# Immunized,# Eligible,% Coverage,95% CI',
  '2018,Central,HBV - Dose 1,"1,050","1,200",0.875,82.0-92.0',
  '2018,Northern,HPV,,900,0.9,',
].join('\n');

describe('typeCell', () => {
  it('types plain decimal literals as numbers', () => {
    expect(typeCell('2018')).toBe(2018);
    expect(typeCell('0.875')).toBe(0.875);
    expect(typeCell(' -5.0 ')).toBe(-5);
  });

  it('keeps everything else as text', () => {
    expect(typeCell('1,050')).toBe('1,050');
    expect(typeCell('82.0-92.0')).toBe('82.0-92.0');
    expect(typeCell('1e3')).toBe('1e3');
    expect(typeCell(' ')).toBe(' ');
  });

  it('maps an empty cell to null', () => {
    expect(typeCell('')).toBeNull();
  });

  it('can leave every cell as text', () => {
    expect(typeCell('2018', false)).toBe('2018');
    expect(typeCell('', false)).toBeNull();
  });
});

describe('parseCsvDataset', () => {
  it('parses the header and typed rows', () => {
    const dataset = parseCsvDataset(SAMPLE);

    expect(dataset.columns.map((column) => column.name)).toEqual([
      'Year',
      'Zone',
      'Vaccine',
      '# Immunized',
      '# Eligible',
      '% Coverage',
      '95% CI',
    ]);
    expect(dataset.columns.every((column) => column.type === 'unknown')).toBe(true);
    expect(dataset.rows).toEqual([
      {
        Year: 2018,
        Zone: 'Central',
        Vaccine: 'HBV - Dose 1',
        '# Immunized': '1,050',
        '# Eligible': '1,200',
        '% Coverage': 0.875,
        '95% CI': '82.0-92.0',
      },
      {
        Year: 2018,
        Zone: 'Northern',
        Vaccine: 'HPV',
        '# Immunized': null,
        '# Eligible': 900,
        '% Coverage': 0.9,
        '95% CI': null,
      },
    ]);
  });

  it('strips a byte order mark', () => {
    const dataset = parseCsvDataset('\uFEFFYear\n2018');
    expect(dataset.columns[0].name).toBe('Year');
  });

  it('pads short rows with nulls and ignores extra cells', () => {
    const dataset = parseCsvDataset('a,b\n1\n2,3,4');
    expect(dataset.rows).toEqual([
      { a: 1, b: null },
      { a: 2, b: 3 },
    ]);
  });

  it('skips empty lines', () => {
    expect(parseCsvDataset('a\n1\n\n2\n').rows).toHaveLength(2);
  });

  it('honors a custom delimiter', () => {
    expect(parseCsvDataset('a;b\n1;x', { delimiter: ';' }).rows).toEqual([{ a: 1, b: 'x' }]);
  });

  it('rejects input without a header', () => {
    expect(() => parseCsvDataset('')).toThrow(DatasetSourceError);
    expect(() => parseCsvDataset('', {}, 'empty.csv')).toThrow('CSV empty.csv has no header row');
  });

  it('names blank header cells by position', () => {
    const dataset = parseCsvDataset('Year,,Zone,\n2018,x,Central,\n');

    expect(dataset.columns.map((column) => column.name)).toEqual(['Year', '_c1', 'Zone', '_c3']);
    expect(dataset.rows).toEqual([{ Year: 2018, _c1: 'x', Zone: 'Central', _c3: null }]);
  });

  it('rejects duplicate header names', () => {
    expect(() => parseCsvDataset('Zone,Zone\nA,B')).toThrow('Duplicate column "Zone" in CSV header');
  });

  it('rejects unterminated quotes', () => {
    expect(() => parseCsvDataset('a,b\n"1,2\n3,4', {}, 'broken.csv')).toThrow(
      /^Malformed CSV in broken\.csv at row \d+: /
    );
  });
});

describe('readCsvDataset', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'csv-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('reads a file', async () => {
    const filePath = path.join(tempDir, 'coverage.csv');
    await fs.writeFile(filePath, SAMPLE);

    const dataset = await readCsvDataset(filePath);
    expect(dataset.rows).toHaveLength(2);
  });

  it('wraps read failures', async () => {
    const filePath = path.join(tempDir, 'missing.csv');

    await expect(readCsvDataset(filePath)).rejects.toThrow(DatasetSourceError);
    await expect(readCsvDataset(filePath)).rejects.toThrow(`Cannot read dataset file ${filePath}`);
  });
});
