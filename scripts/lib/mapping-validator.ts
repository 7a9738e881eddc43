import * as fs from 'fs';
import * as path from 'path';
import { MappingStore } from './mapping-store';
import { BASE_FIELDS, ViewTarget } from './sections';
import { sanitizeColumnName } from './csv-inspector';

/**
 * Advisory mapping validator
 * ==========================
 * Compares a year's mappings with the headers of the real CSV. Suggestions for
 * source fields that are not found come from findSimilarField and are only ever
 * written to a separate corrections file; the config document is never edited.
 */

export interface SectionMappingReport {
  sectionCode: string;
  mappingKey: string;
  year: string;
  csvFile: string | null;
  actualFields: string[];
  /** Standard field to source expression (or null) whose columns all exist. */
  valid: Record<string, string | null>;
  /** Standard field to source expression referencing a column that does not exist. */
  invalid: Record<string, string>;
  /** Standard fields, other than the base columns, with no entry for the year. */
  missing: string[];
  /** Suggested replacement source column for invalid fields. */
  suggestions: Record<string, string>;
  error?: string;
}

/** Keyword families tried when neither an exact nor a substring match exists. */
const FIELD_FAMILIES: Array<[string, string[]]> = [
  ['total', ['total', 'tot']],
  ['reject', ['reject', 'denied', 'invalid']],
  ['count', ['count', 'cnt', 'total']],
  ['mail', ['mail', 'absentee', 'post']],
  ['uocava', ['uocava', 'military', 'overseas']],
];

const SQL_WORDS = new Set([
  'and', 'as', 'case', 'cast', 'coalesce', 'else', 'end', 'float', 'bigint', 'int', 'is', 'isnull',
  'not', 'null', 'nullif', 'nvarchar', 'or', 'then', 'try_cast', 'varchar', 'when', 'max',
]);

/**
 * Column names an expression refers to: identifiers that are not SQL words or
 * the contents of string literals.
 */
export function referencedColumns(expression: string): string[] {
  const withoutLiterals = expression.replace(/'(?:[^']|'')*'/g, ' ');
  const words = withoutLiterals.match(/\[[^\]]+\]|[A-Za-z_][A-Za-z0-9_]*/g) ?? [];
  const columns = words
    .map(word => (word.startsWith('[') ? word.slice(1, -1) : word))
    .filter(word => !SQL_WORDS.has(word.toLowerCase()));
  return [...new Set(columns)];
}

/** Case-insensitive lookup of a column among CSV headers or their sanitized forms. */
export function hasColumn(headers: string[], column: string): boolean {
  const wanted = column.toLowerCase();
  return headers.some(
    (header, index) => header.toLowerCase() === wanted || sanitizeColumnName(header, index).toLowerCase() === wanted
  );
}

/**
 * Suggest a similar field: case-insensitive exact match, then substring match,
 * then a field sharing a keyword family with the target. Null when nothing fits.
 */
export function findSimilarField(target: string, availableFields: string[]): string | null {
  const targetLower = target.toLowerCase();

  const exact = availableFields.find(field => field.toLowerCase() === targetLower);
  if (exact) {
    return exact;
  }

  const contains = availableFields.find(field => {
    const fieldLower = field.toLowerCase();
    return fieldLower.includes(targetLower) || targetLower.includes(fieldLower);
  });
  if (contains) {
    return contains;
  }

  for (const [keyword, alternatives] of FIELD_FAMILIES) {
    if (!targetLower.includes(keyword)) {
      continue;
    }
    for (const alt of alternatives) {
      const match = availableFields.find(field => field.toLowerCase().includes(alt));
      if (match) {
        return match;
      }
    }
  }

  return null;
}

export function validateSectionMappings(
  store: MappingStore,
  target: ViewTarget,
  year: string,
  headers: string[],
  csvFile: string | null = null
): SectionMappingReport {
  const report: SectionMappingReport = {
    sectionCode: target.sectionCode,
    mappingKey: target.mappingKey,
    year,
    csvFile,
    actualFields: headers,
    valid: {},
    invalid: {},
    missing: [],
    suggestions: {},
  };

  if (!store.hasYear(target.mappingKey, year)) {
    report.error = `No ${year} mappings found for ${target.mappingKey}`;
    return report;
  }

  const mapping = store.getYearMapping(target.mappingKey, year);
  const baseFields: readonly string[] = target.baseFields ?? BASE_FIELDS;

  for (const [field, source] of Object.entries(mapping)) {
    if (source === null) {
      report.valid[field] = null;
      continue;
    }
    const absent = referencedColumns(source).filter(column => !hasColumn(headers, column));
    if (absent.length === 0) {
      report.valid[field] = source;
      continue;
    }
    report.invalid[field] = source;
    const suggestion = findSimilarField(absent[0], headers);
    if (suggestion) {
      report.suggestions[field] = suggestion;
    }
  }

  for (const field of store.getStandardFields(target.mappingKey)) {
    if (!baseFields.includes(field) && !(field in mapping)) {
      report.missing.push(field);
    }
  }

  return report;
}

export function hasMappingProblems(report: SectionMappingReport): boolean {
  return report.error !== undefined || Object.keys(report.invalid).length > 0 || report.missing.length > 0;
}

export type CorrectedMappings = Record<string, Record<string, Record<string, string>>>;

/**
 * Year mappings with suggestions applied and missing fields set to "null",
 * keyed like the config document.
 */
export function buildCorrectedMappings(reports: SectionMappingReport[]): CorrectedMappings {
  const corrected: CorrectedMappings = {};

  for (const report of reports) {
    if (report.error) {
      continue;
    }
    const yearMapping: Record<string, string> = {};
    for (const [field, source] of Object.entries(report.valid)) {
      yearMapping[field] = source ?? 'null';
    }
    for (const [field, source] of Object.entries(report.invalid)) {
      yearMapping[field] = report.suggestions[field] ?? source;
    }
    for (const field of report.missing) {
      yearMapping[field] = 'null';
    }
    corrected[report.mappingKey] = { ...corrected[report.mappingKey], [report.year]: yearMapping };
  }

  return corrected;
}

export function writeCorrectedMappings(outputPath: string, corrected: CorrectedMappings): void {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, JSON.stringify(corrected, null, 2) + '\n', 'utf-8');
}

export function printMappingReport(report: SectionMappingReport): void {
  console.log(`\n🔍 Validating ${report.sectionCode.toUpperCase()} mappings...`);
  console.log('════════════════════════════════════════════════════════════════');
  if (report.error) {
    console.log(`  ❌ ${report.error}`);
    return;
  }
  console.log(`  ✓ Found ${report.actualFields.length} fields in ${report.csvFile ?? report.sectionCode}`);
  for (const [field, source] of Object.entries(report.valid)) {
    console.log(`  ✅ ${field} -> ${source ?? 'NULL'}`);
  }
  for (const [field, source] of Object.entries(report.invalid)) {
    console.log(`  ❌ ${field} -> ${source} (NOT FOUND)`);
    const suggestion = report.suggestions[field];
    if (suggestion) {
      console.log(`      💡 Did you mean: ${suggestion}?`);
    }
  }
  for (const field of report.missing) {
    console.log(`  ⚠️  Missing mapping for: ${field}`);
  }
}
