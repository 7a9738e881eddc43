/**
 * Unit Tests for the advisory mapping validator
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  buildCorrectedMappings,
  findSimilarField,
  hasColumn,
  hasMappingProblems,
  referencedColumns,
  validateSectionMappings,
  writeCorrectedMappings,
} from '../mapping-validator';
import { MappingStore } from '../mapping-store';
import { REG_TARGET } from './helpers/fakes';

const store = MappingStore.fromDocument({
  registration_mappings: {
    standard_fields: ['fips', 'election_year', 'state', 'county', 'total_reg', 'mail_total', 'active_reg', 'other_reg'],
    '2024': { total_reg: 'a1a_total', mail_total: 'mail_returned', active_reg: 'null' },
  },
});

const HEADERS = ['FIPS', 'State', 'County', 'a1a_total', 'mail_returned_total', 'Other Reg'];

describe('referencedColumns', () => {
  test('should ignore SQL words, numbers and string literals', () => {
    expect(referencedColumns("COALESCE([Total Reg], 0) + CAST(A1b AS INT) + 'x y'")).toEqual(['Total Reg', 'A1b']);
  });

  test('should list a repeated column once', () => {
    expect(referencedColumns('(C9r + C9r)')).toEqual(['C9r']);
  });
});

describe('hasColumn', () => {
  test('should compare case-insensitively against raw and sanitized headers', () => {
    expect(hasColumn(['a1a'], 'A1A')).toBe(true);
    expect(hasColumn(['Total Reg'], 'Total_Reg')).toBe(true);
    expect(hasColumn(['Total Reg'], 'TotalReg')).toBe(false);
  });
});

describe('findSimilarField', () => {
  test('should prefer an exact match, then a substring match', () => {
    expect(findSimilarField('fips', ['state', 'FIPS'])).toBe('FIPS');
    expect(findSimilarField('mail_returned', HEADERS)).toBe('mail_returned_total');
  });

  test('should fall back to keyword families', () => {
    expect(findSimilarField('uocava_rejected', ['fips', 'military_ballots'])).toBe('military_ballots');
  });

  test('should return null when nothing is similar', () => {
    expect(findSimilarField('xyz', ['fips'])).toBeNull();
  });
});

describe('validateSectionMappings', () => {
  test('should split fields into valid, invalid and missing', () => {
    const report = validateSectionMappings(store, REG_TARGET, '2024', HEADERS, 'a.csv');

    expect(report).toEqual({
      sectionCode: 'a_reg',
      mappingKey: 'registration_mappings',
      year: '2024',
      csvFile: 'a.csv',
      actualFields: HEADERS,
      valid: { total_reg: 'a1a_total', active_reg: null },
      invalid: { mail_total: 'mail_returned' },
      missing: ['other_reg'],
      suggestions: { mail_total: 'mail_returned_total' },
    });
    expect(hasMappingProblems(report)).toBe(true);
  });

  test('should report a year without mappings', () => {
    const report = validateSectionMappings(store, REG_TARGET, '2030', HEADERS);
    expect(report.error).toBe('No 2030 mappings found for registration_mappings');
    expect(hasMappingProblems(report)).toBe(true);
  });

  test('should pass when every mapped column exists', () => {
    const clean = MappingStore.fromDocument({
      registration_mappings: { standard_fields: ['fips', 'total_reg'], '2024': { total_reg: 'a1a_total' } },
    });
    expect(hasMappingProblems(validateSectionMappings(clean, REG_TARGET, '2024', HEADERS))).toBe(false);
  });
});

describe('corrected mappings', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'eavs-corrected-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('should apply suggestions and null out missing fields', () => {
    const corrected = buildCorrectedMappings([validateSectionMappings(store, REG_TARGET, '2024', HEADERS)]);
    expect(corrected).toEqual({
      registration_mappings: {
        '2024': { total_reg: 'a1a_total', active_reg: 'null', mail_total: 'mail_returned_total', other_reg: 'null' },
      },
    });
  });

  test('should skip reports with an error', () => {
    expect(buildCorrectedMappings([validateSectionMappings(store, REG_TARGET, '2030', HEADERS)])).toEqual({});
  });

  test('should write the corrections to a separate file', () => {
    const output = path.join(dir, 'nested', 'corrected.json');
    const corrected = buildCorrectedMappings([validateSectionMappings(store, REG_TARGET, '2024', HEADERS)]);

    writeCorrectedMappings(output, corrected);

    expect(JSON.parse(fs.readFileSync(output, 'utf-8'))).toEqual(corrected);
  });
});
