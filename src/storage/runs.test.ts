import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { RUN_ID_PATTERN, generateRunId, createRunDir, listRuns } from './runs.js';

describe('runs', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'runs-test-'));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  describe('generateRunId', () => {
    it('formats local time as YYYYMMDD-HHMMSS', () => {
      expect(generateRunId(new Date(2026, 0, 2, 14, 35, 12))).toBe('20260102-143512');
      expect(generateRunId(new Date(2026, 10, 30, 3, 4, 5))).toBe('20261130-030405');
    });

    it('matches the run ID pattern', () => {
      expect(generateRunId()).toMatch(RUN_ID_PATTERN);
    });
  });

  describe('listRuns', () => {
    it('returns an empty list without a runs directory', async () => {
      expect(await listRuns(dataDir)).toEqual([]);
    });

    it('lists run directories newest first', async () => {
      await createRunDir('20260101-090000', dataDir);
      await createRunDir('20260102-143512', dataDir);
      await createRunDir('scratch', dataDir);
      await fs.writeFile(path.join(dataDir, 'runs', '20260103-000000'), '');

      expect(await listRuns(dataDir)).toEqual(['20260102-143512', '20260101-090000']);
    });
  });

  describe('createRunDir', () => {
    it('returns the created directory', async () => {
      const runDir = await createRunDir('20260102-143512', dataDir);

      expect(runDir).toBe(path.join(dataDir, 'runs', '20260102-143512'));
      expect((await fs.stat(runDir)).isDirectory()).toBe(true);
    });
  });
});
