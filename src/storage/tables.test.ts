import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Dataset } from '../dataset/types.js';
import { parseCsvDataset } from '../dataset/csv.js';
import { runNormalization } from '../stages/index.js';
import { ConfigurationError } from '../errors/index.js';
import { saveTable, loadTable, tableExists, listTables, toCsv, exportCsv } from './tables.js';
import { getTablePath } from './paths.js';

const canonical: Dataset = {
  columns: [
    { name: 'year', type: 'unknown' },
    { name: 'vaccine', type: 'unknown' },
    { name: 'no_eligible', type: 'integer' },
    { name: 'pct_coverage', type: 'decimal(4,1)' },
    { name: 'upper_95_pct_ci', type: 'decimal(4,1)' },
  ],
  rows: [
    { year: 2018, vaccine: 'HBV - Dose 1', no_eligible: 1200, pct_coverage: 87.5, upper_95_pct_ci: 92 },
    { year: 2018, vaccine: 'Td, booster', no_eligible: null, pct_coverage: 80, upper_95_pct_ci: null },
  ],
};

describe('tables', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tables-test-'));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  describe('saveTable / loadTable', () => {
    it('round-trips columns and rows', async () => {
      const filePath = await saveTable('ns_school_immunization', canonical, {
        runId: '20260102-143512',
        dataDir,
      });
      const table = await loadTable('ns_school_immunization', dataDir);

      expect(filePath).toBe(path.join(dataDir, 'tables', 'ns_school_immunization.json'));
      expect(table.tableName).toBe('ns_school_immunization');
      expect(table.runId).toBe('20260102-143512');
      expect(table.rowCount).toBe(2);
      expect(table.columns).toEqual(canonical.columns);
      expect(table.rows).toEqual(canonical.rows);
    });

    it('overwrites the previous contents', async () => {
      await saveTable('coverage', canonical, { dataDir });
      await saveTable('coverage', { columns: canonical.columns, rows: [] }, { dataDir });

      const table = await loadTable('coverage', dataDir);
      expect(table.rows).toEqual([]);
    });

    it('rejects invalid table names', async () => {
      await expect(saveTable('Bad Name', canonical, { dataDir })).rejects.toThrow(ConfigurationError);
    });

    it('reports a missing table', async () => {
      await expect(loadTable('missing', dataDir)).rejects.toThrow('Table not found: missing');
    });

    it('reloads a table normalized from a header with a trailing comma', async () => {
      const raw = parseCsvDataset(
        'Year,Zone,Vaccine,# Immunized,# Eligible,% Coverage,95% CI,\n' +
          '2018,Central,HBV - Dose 1,"1,050","1,200",0.875,82.0-92.0,\n'
      );
      const { dataset } = runNormalization(raw);

      await saveTable('trailing_comma', dataset, { dataDir });
      const table = await loadTable('trailing_comma', dataDir);

      expect(table.columns.map((column) => column.name)).toContain('_c7');
      expect(table.rows[0]._c7).toBeNull();
      expect(table.rows[0].lower_95_pct_ci).toBe(82);
    });

    it('rejects a table whose row count does not match', async () => {
      await saveTable('coverage', canonical, { dataDir });
      const filePath = getTablePath('coverage', dataDir);
      const content = await fs.readFile(filePath, 'utf-8');
      await fs.writeFile(filePath, content.replace('"rowCount": 2', '"rowCount": 5'));

      await expect(loadTable('coverage', dataDir)).rejects.toThrow('rowCount does not match');
    });
  });

  describe('tableExists / listTables', () => {
    it('lists saved tables alphabetically', async () => {
      expect(await listTables(dataDir)).toEqual([]);

      await saveTable('zeta', canonical, { dataDir });
      await saveTable('alpha', canonical, { dataDir });
      await fs.writeFile(path.join(dataDir, 'tables', 'notes.txt'), '');

      expect(await listTables(dataDir)).toEqual(['alpha', 'zeta']);
      expect(await tableExists('alpha', dataDir)).toBe(true);
      expect(await tableExists('beta', dataDir)).toBe(false);
    });
  });

  describe('toCsv', () => {
    it('keeps decimal scale and writes nulls as empty cells', () => {
      expect(toCsv(canonical).split('\n')).toEqual([
        'year,vaccine,no_eligible,pct_coverage,upper_95_pct_ci',
        '2018,HBV - Dose 1,1200,87.5,92.0',
        '2018,"Td, booster",,80.0,',
      ]);
    });
  });

  describe('exportCsv', () => {
    it('writes the file with a trailing newline', async () => {
      const filePath = path.join(dataDir, 'out', 'coverage.csv');

      const count = await exportCsv(canonical, filePath);
      const content = await fs.readFile(filePath, 'utf-8');

      expect(count).toBe(2);
      expect(content.endsWith('80.0,\n')).toBe(true);
      expect(content.split('\n')).toHaveLength(4);
    });
  });
});
