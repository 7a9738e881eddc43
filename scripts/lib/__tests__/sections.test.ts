/**
 * Unit Tests for section and view target helpers
 */

import { ConfigError } from '../error-handler';
import {
  DEFAULT_DENOMINATOR_TARGETS,
  DEFAULT_VIEW_TARGETS,
  parseDenominatorTargets,
  resolveSourceTable,
  sourceTableFor,
} from '../sections';
import { REG_TARGET } from './helpers/fakes';

describe('resolveSourceTable', () => {
  test('should default to the year schema and county table', () => {
    expect(resolveSourceTable(REG_TARGET, '2024')).toEqual({ schema: 'eavs_2024', table: 'eavs_county_24_a_reg' });
  });

  test('should substitute the year into a configured source table', () => {
    expect(resolveSourceTable(DEFAULT_DENOMINATOR_TARGETS[0], '2024')).toEqual({
      schema: 'us_elections_vep',
      table: 'vep_2024',
    });
  });
});

describe('sourceTableFor', () => {
  test('should bracket the database, schema and table', () => {
    expect(sourceTableFor('eavs', DEFAULT_DENOMINATOR_TARGETS[1], '2022')).toBe('[eavs].[acs].[acs_county_cvap_2022]');
  });
});

describe('parseDenominatorTargets', () => {
  test('should use the VEP and ACS views when the document has none', () => {
    expect(parseDenominatorTargets({}).map(t => t.viewName)).toEqual(['vep_union', 'acs_population_union']);
  });

  test('should give configured targets election_year as their only base field', () => {
    const [target] = parseDenominatorTargets({
      denominator_views: [
        { mapping_key: 'vep_mappings', section_code: 'vep', view_name: 'vep_union', source_table: 'vep.vep_{yy}' },
      ],
    });

    expect(target).toEqual({
      mappingKey: 'vep_mappings',
      sectionCode: 'vep',
      viewName: 'vep_union',
      outputFile: 'vep_union.sql',
      stagingTable: 'stg_vep_union',
      ctePrefix: 'vep',
      baseFields: ['election_year'],
      sourceTable: 'vep.vep_{yy}',
    });
    expect(resolveSourceTable(target, '2024')).toEqual({ schema: 'vep', table: 'vep_24' });
  });

  test('should reject a source table without a schema', () => {
    expect(() =>
      parseDenominatorTargets({
        denominator_views: [{ mapping_key: 'vep_mappings', section_code: 'vep', view_name: 'vep_union', source_table: 'vep_2024' }],
      })
    ).toThrow(new ConfigError('denominator_views[0]: source_table "vep_2024" must be <schema>.<table>'));
  });

  test('should not add denominator views to the EAVS view list', () => {
    expect(DEFAULT_VIEW_TARGETS.some(t => t.mappingKey === 'vep_mappings')).toBe(false);
  });
});
