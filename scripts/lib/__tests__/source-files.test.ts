/**
 * Unit Tests for locating a year's section CSV files
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_SOURCE_SECTIONS, SourceSection } from '../sections';
import { findMatchingEntries, resolveSourceFile } from '../source-files';

function section(code: string): SourceSection {
  const found = DEFAULT_SOURCE_SECTIONS.find(s => s.sectionCode === code);
  if (!found) {
    throw new Error(`no default section ${code}`);
  }
  return found;
}

describe('findMatchingEntries', () => {
  const entries = ['Section F1_ Participation and Methods', 'Section F2_ Voting Technology', 'readme.txt'];

  test('should match a trailing wildcard', () => {
    expect(findMatchingEntries(entries, 'Section F1_ Participation*')).toEqual(['Section F1_ Participation and Methods']);
  });

  test('should match a leading wildcard', () => {
    expect(findMatchingEntries(entries, '*.txt')).toEqual(['readme.txt']);
  });

  test('should match exact names only without a wildcard', () => {
    expect(findMatchingEntries(entries, 'readme.txt')).toEqual(['readme.txt']);
    expect(findMatchingEntries(entries, 'readme')).toEqual([]);
  });
});

describe('resolveSourceFile', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'eavs-data-'));
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  function touch(...segments: string[]): string {
    const file = path.join(dataDir, ...segments);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, 'fips\n01001\n');
    return file;
  }

  test('should find the file named by the section pattern', () => {
    const file = touch('Section A_ Registration', 'EAVS_county_24_A_REG.csv');
    expect(resolveSourceFile(dataDir, section('a_reg'), '2024')).toEqual({ path: file, fallback: false });
  });

  test('should follow a wildcard directory segment', () => {
    const file = touch('Section F1_ Participation & Methods', 'EAVS_county_22_F1_PARTICIPATION.csv');
    expect(resolveSourceFile(dataDir, section('f1_participation'), '2022')).toEqual({ path: file, fallback: false });
  });

  test('should fall back to the first CSV in the section directory', () => {
    touch('Section C_ Mail', 'notes.txt');
    const file = touch('Section C_ Mail', 'c_mail_2024_final.csv');
    expect(resolveSourceFile(dataDir, section('c_mail'), '2024')).toEqual({ path: file, fallback: true });
  });

  test('should return null when the section directory or any CSV is missing', () => {
    expect(resolveSourceFile(dataDir, section('a_reg'), '2024')).toBeNull();
    touch('Section B_ UOCAVA', 'notes.txt');
    expect(resolveSourceFile(dataDir, section('b_uocava'), '2024')).toBeNull();
    expect(resolveSourceFile(path.join(dataDir, 'missing'), section('a_reg'), '2024')).toBeNull();
  });
});
