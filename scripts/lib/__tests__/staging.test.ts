/**
 * Unit Tests for staging table refresh and CSV backups
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  backupFileName,
  backupTimestamp,
  escapeCsvValue,
  exportStagingYear,
  refreshStagingTable,
  toCsv,
} from '../staging';
import { FakeWarehouse, REG_TARGET } from './helpers/fakes';

describe('escapeCsvValue', () => {
  test('should quote values that need it', () => {
    expect(escapeCsvValue(null)).toBe('');
    expect(escapeCsvValue(undefined)).toBe('');
    expect(escapeCsvValue(true)).toBe('1');
    expect(escapeCsvValue(42)).toBe('42');
    expect(escapeCsvValue('Autauga, AL')).toBe('"Autauga, AL"');
    expect(escapeCsvValue('say "hi"')).toBe('"say ""hi"""');
  });

  test('should write dates without the ISO separators', () => {
    expect(escapeCsvValue(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe('2024-01-02 03:04:05.000');
  });
});

describe('toCsv', () => {
  test('should end every line with a newline', () => {
    expect(toCsv(['fips', 'total'], [['01001', 5], ['01003', null]])).toBe('fips,total\n01001,5\n01003,\n');
  });
});

describe('backup file names', () => {
  test('should combine table, year and date', () => {
    const timestamp = backupTimestamp(new Date(Date.UTC(2024, 10, 5, 12)));
    expect(timestamp).toBe('20241105');
    expect(backupFileName('stg_eavs_county_reg_union', '2024', timestamp)).toBe(
      'stg_eavs_county_reg_union_2024_20241105.csv'
    );
  });
});

describe('refreshStagingTable', () => {
  test('should rebuild the staging table from the view', async () => {
    const warehouse = new FakeWarehouse();
    warehouse.setView('analytics', REG_TARGET.viewName, 'CREATE OR ALTER VIEW ...');
    warehouse.loadRowCounts.set(REG_TARGET.stagingTable, 3);

    await expect(refreshStagingTable(warehouse, 'analytics', REG_TARGET)).resolves.toBe(3);
    expect(await warehouse.tableExists('analytics', REG_TARGET.stagingTable)).toBe(true);
  });
});

describe('exportStagingYear', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'eavs-backup-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test("should write one year's rows in column order", async () => {
    const warehouse = new FakeWarehouse();
    warehouse.setTable('analytics', 'stg', { columns: ['fips', 'election_year', 'total'], rows: [] });
    warehouse.queryHandler = () => [
      { total: 5, fips: '01001', election_year: '2024' },
      { fips: '01003', election_year: '2024', total: null },
    ];

    const result = await exportStagingYear(warehouse, 'analytics', 'stg', '2024', dir, '20241105');

    expect(result).toEqual({ filePath: path.join(dir, 'stg_2024_20241105.csv'), rows: 2 });
    expect(fs.readFileSync(result.filePath, 'utf-8')).toBe(
      'fips,election_year,total\n01001,2024,5\n01003,2024,\n'
    );
    expect(warehouse.queries).toEqual([
      { sql: 'SELECT * FROM [analytics].[stg] WHERE election_year = @year', params: { year: '2024' } },
    ]);
  });

  test('should fail for a missing table', async () => {
    const warehouse = new FakeWarehouse();
    await expect(exportStagingYear(warehouse, 'analytics', 'stg', '2024', dir)).rejects.toThrow(
      'Table [analytics].[stg] not found'
    );
  });
});
