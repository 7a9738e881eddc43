/**
 * Unit Tests for the EAVS year loader
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ProgressReporter } from '../progress-reporter';
import { DEFAULT_SOURCE_SECTIONS } from '../sections';
import { generateCteUnionView } from '../union-generator';
import { EavsYearLoader, parseLoadStep, YearLoadOptions } from '../year-loader';
import { FakeObjectStore, FakeWarehouse, REG_TARGET, registrationStore, TEST_BLOB } from './helpers/fakes';

const GLOBAL = { projectId: 'p', analyticsDataset: 'analytics', bucket: 'b' };

describe('parseLoadStep', () => {
  test('should accept the known steps and all', () => {
    expect(parseLoadStep('views')).toBe('views');
    expect(parseLoadStep('all')).toBe('all');
    expect(parseLoadStep('bogus')).toBeNull();
  });
});

describe('EavsYearLoader', () => {
  const sections = DEFAULT_SOURCE_SECTIONS.filter(s => s.sectionCode === 'a_reg' || s.sectionCode === 'c_mail');
  let root: string;
  let dataDir: string;
  let manualDir: string;
  let warehouse: FakeWarehouse;
  let objectStore: FakeObjectStore;
  let registrationFile: string;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    root = fs.mkdtempSync(path.join(os.tmpdir(), 'eavs-loader-'));
    dataDir = path.join(root, 'data');
    manualDir = path.join(root, 'manual');
    const sectionDir = path.join(dataDir, 'Section A_ Registration');
    fs.mkdirSync(sectionDir, { recursive: true });
    registrationFile = path.join(sectionDir, 'EAVS_county_24_A_REG.csv');
    fs.writeFileSync(registrationFile, 'fips,state,a1a_total\n01001,AL,100\n');

    warehouse = new FakeWarehouse();
    objectStore = new FakeObjectStore();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(root, { recursive: true, force: true });
  });

  function loader(options: Partial<YearLoadOptions> = {}): EavsYearLoader {
    return new EavsYearLoader(
      {
        store: registrationStore(['2016', '2024']),
        sections,
        targets: [REG_TARGET],
        warehouse,
        objectStore,
        blob: TEST_BLOB,
        global: GLOBAL,
        reporter: new ProgressReporter(),
      },
      { year: '2024', dataDir, manualDir, ...options }
    );
  }

  test('should upload the files it finds and skip missing sections', async () => {
    const results = await loader().run('upload');

    expect(objectStore.uploads.get('2024/a_reg.csv')).toBe(registrationFile);
    expect(results.all()).toEqual([
      { step: 'upload', item: 'c_mail', status: 'skipped', reason: 'source file not found' },
      { step: 'upload', item: 'a_reg', status: 'success' },
    ]);
    expect(results.exitCode()).toBe(0);
  });

  test('should record a failed upload and continue', async () => {
    objectStore.failPaths.add('2024/a_reg.csv');
    const results = await loader().run('upload');
    expect(results.failures()).toEqual([
      {
        step: 'upload',
        item: 'a_reg',
        status: 'failed',
        reason: 'This request is not authorized to perform this operation.',
      },
    ]);
  });

  test('should fail when the data directory holds no source files', async () => {
    fs.rmSync(registrationFile);
    const results = await loader().run('upload');
    expect(results.failures()).toEqual([
      {
        step: 'upload',
        item: dataDir,
        status: 'failed',
        reason: 'No source files found. Check the data directory structure.',
      },
    ]);
  });

  test('should load year tables with columns inferred from the CSV', async () => {
    warehouse.loadRowCounts.set('eavs_county_24_a_reg', 3100);
    const results = await loader().run('tables');

    expect(warehouse.loads).toEqual([
      {
        schema: 'eavs_2024',
        table: 'eavs_county_24_a_reg',
        columns: [
          { sourceName: 'fips', name: 'fips', sqlType: 'NVARCHAR(MAX)' },
          { sourceName: 'state', name: 'state', sqlType: 'NVARCHAR(MAX)' },
          { sourceName: 'a1a_total', name: 'a1a_total', sqlType: 'BIGINT' },
        ],
        blobPath: '2024/a_reg.csv',
        rowTerminator: '0x0A',
        blob: TEST_BLOB,
      },
    ]);
    expect(results.all()[1]).toEqual({ step: 'tables', item: 'eavs_county_24_a_reg', status: 'success', rows: 3100 });
  });

  test('should run every step in order', async () => {
    warehouse.loadRowCounts.set('eavs_county_24_a_reg', 3100);
    warehouse.loadRowCounts.set(REG_TARGET.stagingTable, 6200);

    const results = await loader().run();

    expect(results.summaryLines()).toEqual([
      'upload:',
      '  ⏭️  c_mail - source file not found',
      '  ✅ a_reg',
      'tables:',
      '  ⏭️  c_mail - source file not found',
      '  ✅ eavs_county_24_a_reg (3,100 rows)',
      'views:',
      '  ✅ eavs_county_reg_union',
      'materialize:',
      '  ✅ stg_eavs_county_reg_union (6,200 rows)',
      'validate:',
      '  ✅ eavs_county_24_a_reg',
      '  ⏭️  eavs_county_24_c_mail - table not loaded',
    ]);
    expect(warehouse.replaced).toEqual([
      generateCteUnionView(registrationStore(['2016', '2024']), REG_TARGET, GLOBAL).sql,
    ]);
    expect(results.exitCode()).toBe(0);
  });

  test('should change nothing in a dry run', async () => {
    const results = await loader({ dryRun: true }).run();

    expect(objectStore.uploads.size).toBe(0);
    expect(warehouse.loads).toEqual([]);
    expect(warehouse.replaced).toEqual([]);
    expect(fs.existsSync(path.join(manualDir, 'eavs_county_reg_union_preview.sql'))).toBe(true);
    expect(results.count('success')).toBe(0);
    expect(results.exitCode()).toBe(0);
  });

  test('should report an unparseable view without replacing it', async () => {
    warehouse.setView('analytics', REG_TARGET.viewName, 'CREATE VIEW [analytics].[eavs_county_reg_union] AS SELECT 1');

    const results = await loader().run('views');

    expect(warehouse.replaced).toEqual([]);
    expect(results.failures()).toHaveLength(1);
    expect(results.failures()[0].reason).toMatch(/^unverified: Unsupported view format: /);
    expect(fs.existsSync(path.join(manualDir, 'eavs_county_reg_union_current.sql'))).toBe(true);
  });
});
