/**
 * Unit Tests for the loaded-year status check
 */

import { ProgressReporter } from '../progress-reporter';
import { DEFAULT_SOURCE_SECTIONS } from '../sections';
import { checkYearStatus, YearStatusOptions } from '../year-status';
import { FakeWarehouse, REG_TARGET } from './helpers/fakes';

describe('checkYearStatus', () => {
  const options: YearStatusOptions = {
    year: '2024',
    sections: DEFAULT_SOURCE_SECTIONS.filter(s => s.sectionCode === 'a_reg' || s.sectionCode === 'c_mail'),
    targets: [REG_TARGET],
    analyticsSchema: 'analytics',
  };
  let warehouse: FakeWarehouse;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warehouse = new FakeWarehouse();
    warehouse.setTable('eavs_2024', 'eavs_county_24_a_reg', { columns: ['fips'], rows: [{ fips: '01001' }] });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should report tables and view rows for the year', async () => {
    warehouse.queryHandler = () => [{ row_count: 3150 }];

    const results = await checkYearStatus(warehouse, options, new ProgressReporter());

    expect(results.summaryLines()).toEqual([
      'schema:',
      '  ✅ eavs_2024',
      'tables:',
      '  ✅ eavs_county_24_a_reg (1 rows)',
      '  ⚠️  eavs_county_24_c_mail - not found',
      'views:',
      '  ✅ eavs_county_reg_union (3,150 rows)',
    ]);
    expect(results.exitCode()).toBe(0);
  });

  test('should fail a missing schema without checking tables', async () => {
    const results = await checkYearStatus(warehouse, { ...options, year: '2026' }, new ProgressReporter());
    expect(results.all()).toEqual([{ step: 'schema', item: 'eavs_2026', status: 'failed', reason: 'not found' }]);
  });

  test('should keep checking after one table query fails', async () => {
    warehouse.setTable('eavs_2024', 'eavs_county_24_c_mail', { columns: ['fips'], rows: [] });
    warehouse.countRows = async (_schema: string, table: string) => {
      if (table === 'eavs_county_24_a_reg') {
        throw new Error('Connection lost');
      }
      return 3100;
    };

    const results = await checkYearStatus(warehouse, options, new ProgressReporter());

    expect(results.failures()).toEqual([
      { step: 'tables', item: 'eavs_county_24_a_reg', status: 'failed', reason: 'Connection lost' },
    ]);
    expect(results.all()[2]).toEqual({ step: 'tables', item: 'eavs_county_24_c_mail', status: 'success', rows: 3100 });
    expect(results.all()[3]).toEqual({ step: 'views', item: 'eavs_county_reg_union', status: 'warning', reason: 'no data for 2024' });
  });
});
