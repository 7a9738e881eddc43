import { errorMessage } from './error-handler';
import { CsvTable, readCsvTable } from './csv-inspector';
import { hasColumn, referencedColumns } from './mapping-validator';
import { MappingStore } from './mapping-store';
import { findViewTarget, SourceSection, ViewTarget } from './sections';
import { resolveSourceFile } from './source-files';
import { ValidationResult } from './validation-checks';

/**
 * Pre-flight validation: checks a year's CSV files against the mappings before
 * anything is uploaded or loaded.
 */

export const MIN_EXPECTED_ROWS = 10;

/**
 * Check that every mapped source column exists in the CSV header.
 */
export function checkSectionMappings(
  result: ValidationResult,
  store: MappingStore,
  target: ViewTarget,
  year: string,
  headers: string[],
  strict: boolean
): void {
  if (!store.hasYear(target.mappingKey, year)) {
    result.addError(`No field mappings found for ${year} in ${target.mappingKey}`);
    return;
  }
  if (headers.length === 0) {
    result.addError('Could not read CSV headers');
    return;
  }

  const mapping = store.getYearMapping(target.mappingKey, year);
  const missing: string[] = [];
  const nullMapped: string[] = [];
  const mappedColumns = new Set<string>();

  for (const [field, source] of Object.entries(mapping)) {
    if (source === null) {
      nullMapped.push(field);
      continue;
    }
    const columns = referencedColumns(source);
    columns.forEach(column => mappedColumns.add(column.toLowerCase()));
    if (columns.some(column => !hasColumn(headers, column))) {
      missing.push(`${field} (expects: ${source})`);
    }
  }

  if (nullMapped.length > 0 && !strict) {
    result.addWarning(`${nullMapped.length} fields mapped to NULL (expected for this year)`);
  }

  if (missing.length > 0) {
    result.addError(`Missing ${missing.length} expected fields:`);
    missing.slice(0, 10).forEach(field => result.addError(`  - ${field}`));
    if (missing.length > 10) {
      result.addError(`  ... and ${missing.length - 10} more`);
    }
  }

  if (strict) {
    const extra = headers.filter(h => !mappedColumns.has(h.toLowerCase())).sort();
    if (extra.length > 0) {
      result.addWarning(`${extra.length} unmapped fields in CSV (may be new data):`);
      extra.slice(0, 5).forEach(field => result.addWarning(`  - ${field}`));
      if (extra.length > 5) {
        result.addWarning(`  ... and ${extra.length - 5} more`);
      }
    }
  }
}

/**
 * Basic data quality checks on the parsed file
 */
export function checkDataQuality(result: ValidationResult, table: CsvTable): void {
  const totalRows = table.rows.length;
  if (totalRows === 0) {
    result.addError('CSV file is empty (no data rows)');
  } else if (totalRows < MIN_EXPECTED_ROWS) {
    result.addWarning(`Only ${totalRows} rows (expected ~3,000 for county data)`);
  }

  const lower = table.headers.map(h => h.toLowerCase());
  const hasFips = lower.some(h => h.includes('fips'));
  const hasState = lower.some(h => h.includes('state'));
  const hasCounty = lower.some(h => h.includes('county'));

  if (!hasFips && !(hasState && hasCounty)) {
    result.addWarning('No FIPS or state/county columns detected (may be intentional)');
  }
}

export interface PreflightOptions {
  year: string;
  dataDir: string;
  strict?: boolean;
}

/**
 * One ValidationResult per source section.
 */
export function runPreflight(
  store: MappingStore,
  sections: SourceSection[],
  targets: ViewTarget[],
  options: PreflightOptions
): ValidationResult[] {
  const results: ValidationResult[] = [];

  for (const section of sections) {
    const result = new ValidationResult(`Section ${section.sectionCode.toUpperCase()}`);
    results.push(result);

    const resolved = resolveSourceFile(options.dataDir, section, options.year);
    if (!resolved) {
      result.addError(`CSV file not found: ${section.sourceFile}`);
      continue;
    }
    result.addInfo(`File: ${resolved.path}`);
    if (resolved.fallback) {
      result.addWarning(`Expected file name not found; using ${resolved.path}`);
    }

    let table: CsvTable;
    try {
      table = readCsvTable(resolved.path);
    } catch (error) {
      result.addError(`Error reading CSV: ${errorMessage(error)}`);
      continue;
    }

    const target = findViewTarget(targets, section.sectionCode);
    if (target) {
      checkSectionMappings(result, store, target, options.year, table.headers, options.strict ?? false);
    }
    checkDataQuality(result, table);
  }

  return results;
}
