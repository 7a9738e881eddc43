/**
 * Unit Tests for the Union SQL Generator
 *
 * Determinism, column order across years, the NULL fallback and the
 * two-year registration example.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { MappingError } from '../error-handler';
import { MappingStore } from '../mapping-store';
import { DEFAULT_DENOMINATOR_TARGETS, ViewTarget } from '../sections';
import {
  buildCteBlock,
  buildSelectList,
  generateCteUnionView,
  generateUnionView,
  viewHeader,
  writeGeneratedViews,
} from '../union-generator';
import { REG_TARGET, registrationStore, TEST_CTX, vepStore } from './helpers/fakes';

const X_TARGET: ViewTarget = {
  mappingKey: 'x_mappings',
  sectionCode: 'a_reg',
  viewName: 'x_union',
  outputFile: 'x_union.sql',
  stagingTable: 'stg_x_union',
  ctePrefix: 'a_reg',
};

function xStore(years: Record<string, Record<string, unknown>>): MappingStore {
  return MappingStore.fromDocument({
    x_mappings: { standard_fields: ['fips', 'election_year', 'state', 'county', 'a', 'b'], ...years },
  });
}

/** Output column names of each SELECT block of a flat union view. */
function blockAliases(sqlText: string): string[][] {
  return sqlText.split('UNION ALL').map(block => {
    const lines = block.split('\n');
    const start = lines.findIndex(line => line.trim() === 'SELECT');
    const end = lines.findIndex(line => line.trim().startsWith('FROM '));
    return lines.slice(start + 1, end).map(line => {
      const column = line.trim().replace(/,$/, '');
      const alias = /\bAS\s+(\w+)$/.exec(column);
      return alias ? alias[1] : column;
    });
  });
}

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('buildSelectList', () => {
  test('should lead with the base columns and the year literal', () => {
    const store = registrationStore();
    expect(buildSelectList(store, 'registration_mappings', '2018')).toEqual([
      'fips',
      "'2018' AS election_year",
      'state',
      'county',
      'state_abbr',
      'county_name',
      'A1a AS a',
      'NULL AS b',
    ]);
  });

  test('should use NULL for a field absent from the year mapping', () => {
    const store = xStore({ '2016': { a: 'col_a' } });
    expect(buildSelectList(store, 'x_mappings', '2016').slice(-2)).toEqual(['col_a AS a', 'NULL AS b']);
  });

  test('should emit NULL exactly for null, "null" and absent values', () => {
    const store = xStore({ '2016': { a: 'null', b: 'col_b' }, '2018': { a: null }, '2020': { a: 'col_a', b: 'col_b' } });
    const nullFields = (year: string): string[] =>
      buildSelectList(store, 'x_mappings', year)
        .filter(column => column.startsWith('NULL AS '))
        .map(column => column.slice('NULL AS '.length));

    expect(nullFields('2016')).toEqual(['a']);
    expect(nullFields('2018')).toEqual(['a', 'b']);
    expect(nullFields('2020')).toEqual([]);
  });

  test('should reject an empty source expression', () => {
    const store = xStore({ '2016': { a: '', b: 'col_b' } });
    expect(() => buildSelectList(store, 'x_mappings', '2016')).toThrow(MappingError);
  });
});

describe('generateUnionView', () => {
  test('should generate the two-year example view', () => {
    const store = xStore({ '2016': { a: 'col_a', b: 'null' }, '2018': { a: 'col_a2', b: 'col_b2' } });
    const view = generateUnionView(store, X_TARGET, TEST_CTX);

    expect(view.years).toEqual(['2016', '2018']);
    expect(view.skipped).toEqual([]);
    expect(view.sql).toBe(
      [
        '-- EAVS x_union Union View',
        '-- Generated from x_mappings; regenerate with scripts/generate-union-views.ts',
        '',
        'CREATE OR ALTER VIEW [analytics].[x_union] AS',
        '-- 2016 Data',
        'SELECT',
        '  fips,',
        "  '2016' AS election_year,",
        '  state,',
        '  county,',
        '  state_abbr,',
        '  county_name,',
        '  col_a AS a,',
        '  NULL AS b',
        'FROM [p].[eavs_2016].[eavs_county_16_a_reg]',
        '',
        'UNION ALL',
        '',
        '-- 2018 Data',
        'SELECT',
        '  fips,',
        "  '2018' AS election_year,",
        '  state,',
        '  county,',
        '  state_abbr,',
        '  county_name,',
        '  col_a2 AS a,',
        '  col_b2 AS b',
        'FROM [p].[eavs_2018].[eavs_county_18_a_reg]',
        '',
      ].join('\n')
    );
  });

  test('should list the same columns in the same order for every year', () => {
    const view = generateUnionView(registrationStore(['2016', '2018', '2020', '2022', '2024']), REG_TARGET, TEST_CTX);
    const aliases = blockAliases(view.sql);

    expect(aliases).toHaveLength(5);
    for (const list of aliases) {
      expect(list).toEqual(['fips', 'election_year', 'state', 'county', 'state_abbr', 'county_name', 'a', 'b']);
    }
  });

  test('should produce identical text for the same mappings', () => {
    const first = generateUnionView(registrationStore(), REG_TARGET, TEST_CTX).sql;
    const second = generateUnionView(registrationStore(), REG_TARGET, TEST_CTX).sql;
    expect(second).toBe(first);
  });

  test('should skip a malformed year and keep the others', () => {
    const store = xStore({ '2016': { a: 'col_a' }, '2018': { a: 5 }, '2020': { b: 'col_b' } });
    const view = generateUnionView(store, X_TARGET, TEST_CTX);

    expect(view.years).toEqual(['2016', '2020']);
    expect(view.skipped).toEqual([{ year: '2018', reason: 'x_mappings 2018: non-string source value for a' }]);
    expect(view.sql).not.toContain('eavs_county_18_a_reg');
  });

  test('should refuse to generate a view with no years', () => {
    const store = xStore({ '2016': { a: 7 } });
    expect(() => generateUnionView(store, X_TARGET, TEST_CTX)).toThrow(MappingError);
    expect(() => generateUnionView(xStore({}), X_TARGET, TEST_CTX)).toThrow(MappingError);
  });

  test('should default to the store global settings', () => {
    const view = generateUnionView(registrationStore(['2016']), REG_TARGET);
    expect(view.sql).toContain('FROM [p].[eavs_2016].[eavs_county_16_a_reg]');
    expect(view.sql).toContain('CREATE OR ALTER VIEW [analytics].[eavs_county_reg_union] AS');
  });
});

describe('generateCteUnionView', () => {
  test('should generate one named block per year and a union_all block', () => {
    const view = generateCteUnionView(registrationStore(['2016']), REG_TARGET, TEST_CTX);

    expect(view.sql).toBe(
      [
        viewHeader(REG_TARGET, TEST_CTX) + 'WITH',
        '  a_reg_2016 AS (',
        '    SELECT',
        '      fips,',
        "      '2016' AS election_year,",
        '      state,',
        '      county,',
        '      state_abbr,',
        '      county_name,',
        '      A1a AS a,',
        '      A1b AS b',
        '    FROM [p].[eavs_2016].[eavs_county_16_a_reg]',
        '  ),',
        '  union_all AS (',
        '    SELECT * FROM a_reg_2016',
        '  )',
        'SELECT * FROM union_all',
        '',
      ].join('\n')
    );
  });

  test('should select every year in ascending order', () => {
    const view = generateCteUnionView(registrationStore(['2020', '2016', '2018']), REG_TARGET, TEST_CTX);
    expect(view.sql).toContain(
      '  union_all AS (\n    SELECT * FROM a_reg_2016\n    UNION ALL\n    SELECT * FROM a_reg_2018\n    UNION ALL\n    SELECT * FROM a_reg_2020\n  )'
    );
  });
});

describe('denominator blocks', () => {
  const [vepTarget] = DEFAULT_DENOMINATOR_TARGETS;

  test('should start with election_year and read the year source table', () => {
    expect(buildCteBlock(vepStore(), vepTarget, '2024', TEST_CTX)).toEqual({
      name: 'vep_2024',
      body: [
        '',
        '    SELECT',
        "      '2024' AS election_year,",
        '      STATE_ABV AS state_abbr,',
        '      VEP AS VEP',
        '    FROM [p].[us_elections_vep].[vep_2024]',
        '  ',
      ].join('\n'),
    });
  });

  test('should build one block per mapped year', () => {
    const view = generateCteUnionView(vepStore(), vepTarget, TEST_CTX);
    expect(view.years).toEqual(['2020', '2024']);
    expect(view.sql).toContain('CREATE OR ALTER VIEW [analytics].[vep_union] AS');
    expect(view.sql).toContain('FROM [p].[us_elections_vep].[vep_2020]');
  });
});

describe('writeGeneratedViews', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'eavs-generated-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('should write one file per view and report missing sections', () => {
    const mailTarget: ViewTarget = { ...REG_TARGET, mappingKey: 'mail_mappings', viewName: 'mail_union', outputFile: 'mail_union.sql' };
    const written = writeGeneratedViews(registrationStore(), [REG_TARGET, mailTarget], dir, { ctx: TEST_CTX });

    expect(written.map(w => w.success)).toEqual([true, false]);
    expect(written[0].years).toEqual(['2016', '2018', '2020']);
    expect(written[1].error).toBe('No mail_mappings section in config');
    expect(fs.readFileSync(path.join(dir, 'registration_union.sql'), 'utf-8')).toBe(
      generateUnionView(registrationStore(), REG_TARGET, TEST_CTX).sql
    );
    expect(fs.existsSync(path.join(dir, 'mail_union.sql'))).toBe(false);
  });

  test('should write the CTE format on request', () => {
    writeGeneratedViews(registrationStore(), [REG_TARGET], dir, { format: 'cte', ctx: TEST_CTX });
    expect(fs.readFileSync(path.join(dir, 'registration_union.sql'), 'utf-8')).toBe(
      generateCteUnionView(registrationStore(), REG_TARGET, TEST_CTX).sql
    );
  });
});
