import * as os from 'node:os';
import * as path from 'node:path';
import {
  DATA_DIR_ENV,
  getDataDir,
  resolveDataDir,
  getTablePath,
  getRunDir,
  getStageFilePath,
  getManifestPath,
} from './paths.js';

describe('paths', () => {
  const dataDir = path.join(os.tmpdir(), 'paths-test');
  let savedEnv: string | undefined;

  beforeEach(() => {
    savedEnv = process.env[DATA_DIR_ENV];
  });

  afterEach(() => {
    if (savedEnv === undefined) {
      delete process.env[DATA_DIR_ENV];
    } else {
      process.env[DATA_DIR_ENV] = savedEnv;
    }
  });

  describe('getDataDir', () => {
    it('defaults to a directory in the home directory', () => {
      delete process.env[DATA_DIR_ENV];
      expect(getDataDir()).toBe(path.join(os.homedir(), '.immunization-etl'));
    });

    it('honors the environment override', () => {
      process.env[DATA_DIR_ENV] = dataDir;
      expect(getDataDir()).toBe(dataDir);
    });
  });

  describe('resolveDataDir', () => {
    it('expands ~', () => {
      expect(resolveDataDir('~/etl')).toBe(path.join(os.homedir(), 'etl'));
    });

    it('resolves relative paths', () => {
      expect(resolveDataDir('etl-data')).toBe(path.resolve('etl-data'));
    });
  });

  describe('table paths', () => {
    it('places tables under tables/', () => {
      expect(getTablePath('ns_school_immunization', dataDir)).toBe(
        path.join(dataDir, 'tables', 'ns_school_immunization.json')
      );
    });

    it('rejects invalid names', () => {
      expect(() => getTablePath('../etc', dataDir)).toThrow('Invalid table name: "../etc"');
      expect(() => getTablePath('Coverage', dataDir)).toThrow('Invalid table name');
    });
  });

  describe('run paths', () => {
    it('builds stage and manifest paths', () => {
      expect(getStageFilePath('20260102-143512', '04_ci_split', dataDir)).toBe(
        path.join(dataDir, 'runs', '20260102-143512', '04_ci_split.json')
      );
      expect(getManifestPath('20260102-143512', dataDir)).toBe(
        path.join(dataDir, 'runs', '20260102-143512', 'manifest.json')
      );
    });

    it('rejects path traversal in run IDs', () => {
      expect(() => getRunDir('../outside', dataDir)).toThrow('path traversal not allowed');
      expect(() => getRunDir('', dataDir)).toThrow('runId is required');
    });

    it('rejects malformed stage IDs', () => {
      expect(() => getStageFilePath('20260102-143512', 'ci_split', dataDir)).toThrow(
        'Invalid stageId format: ci_split'
      );
    });
  });
});
