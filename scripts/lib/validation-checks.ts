import { errorMessage } from './error-handler';
import { qualifiedName, SourceSection, yearSchemaName, yearTableName } from './sections';
import { Row, Warehouse } from './warehouse';

/**
 * Post-load data quality checks
 * Each check returns a ValidationResult; errors fail the check, warnings are advisory.
 */

export const CRITICAL_FIELDS = ['fips', 'state', 'county', 'election_year'];

/** Count fields that are never negative in valid data. */
export const NON_NEGATIVE_FIELDS = [
  'total_reg',
  'total_active_reg',
  'total_inactive_reg',
  'total_ballots_cast',
  'total_turnout',
  'total_part',
];

/** Year-over-year row count change above this percentage is a warning. */
export const MAX_YEAR_OVER_YEAR_CHANGE = 10;

export class ValidationResult {
  readonly info: string[] = [];
  readonly warnings: string[] = [];
  readonly errors: string[] = [];

  constructor(readonly checkName: string) {}

  get passed(): boolean {
    return this.errors.length === 0;
  }

  addInfo(message: string): void {
    this.info.push(message);
  }

  addWarning(message: string): void {
    this.warnings.push(message);
  }

  addError(message: string): void {
    this.errors.push(message);
  }

  print(): void {
    console.log(`\n${this.passed ? '✅' : '❌'} ${this.checkName}`);
    this.info.forEach(msg => console.log(`  ℹ️  ${msg}`));
    this.errors.forEach(msg => console.log(`  ❌ ${msg}`));
    this.warnings.forEach(msg => console.log(`  ⚠️  ${msg}`));
  }
}

export interface ValidationSummary {
  totalChecks: number;
  passedChecks: number;
  warnings: number;
  errors: number;
}

export function summarizeValidation(results: ValidationResult[]): ValidationSummary {
  return {
    totalChecks: results.length,
    passedChecks: results.filter(r => r.passed).length,
    warnings: results.reduce((sum, r) => sum + r.warnings.length, 0),
    errors: results.reduce((sum, r) => sum + r.errors.length, 0),
  };
}

function num(value: unknown): number {
  return typeof value === 'number' ? value : Number(value ?? 0);
}

function fmt(n: number): string {
  return n.toLocaleString('en-US');
}

// =============================================================================
// Evaluation (no warehouse access)
// =============================================================================

export function evaluateRowCount(table: string, rowCount: number, expected: [number, number]): ValidationResult {
  const result = new ValidationResult(`Row Count: ${table}`);
  const [min, max] = expected;

  result.addInfo(`Row count: ${fmt(rowCount)}`);
  if (rowCount === 0) {
    result.addError('Table is empty!');
  } else if (rowCount < min) {
    result.addWarning(`Row count (${fmt(rowCount)}) is below expected minimum (${fmt(min)})`);
  } else if (rowCount > max) {
    result.addWarning(`Row count (${fmt(rowCount)}) is above expected maximum (${fmt(max)})`);
  }
  return result;
}

export interface DuplicateKey {
  value: string;
  count: number;
}

export function evaluateDuplicates(table: string, duplicates: DuplicateKey[]): ValidationResult {
  const result = new ValidationResult(`Duplicate FIPS: ${table}`);
  if (duplicates.length === 0) {
    result.addInfo('No duplicate FIPS codes');
    return result;
  }
  result.addError(`${duplicates.length} FIPS codes appear multiple times:`);
  for (const dup of duplicates.slice(0, 5)) {
    result.addError(`  FIPS ${dup.value}: ${dup.count} times`);
  }
  return result;
}

export function evaluateYearOverYear(
  sectionCode: string,
  current: { year: string; rows: number },
  previous: { year: string; rows: number }
): ValidationResult {
  const result = new ValidationResult(`Year-over-Year Comparison: ${sectionCode}`);
  const diff = current.rows - previous.rows;
  const pctChange = previous.rows > 0 ? (diff / previous.rows) * 100 : 0;

  result.addInfo(`${current.year}: ${fmt(current.rows)} rows`);
  result.addInfo(`${previous.year}: ${fmt(previous.rows)} rows`);
  result.addInfo(`Change: ${diff >= 0 ? '+' : ''}${fmt(diff)} (${pctChange >= 0 ? '+' : ''}${pctChange.toFixed(1)}%)`);

  if (Math.abs(pctChange) > MAX_YEAR_OVER_YEAR_CHANGE) {
    result.addWarning(`Row count changed by ${pctChange.toFixed(1)}% (>${MAX_YEAR_OVER_YEAR_CHANGE}%)`);
  }
  return result;
}

// =============================================================================
// Warehouse checks
// =============================================================================

export async function checkTableExists(warehouse: Warehouse, schema: string, table: string): Promise<ValidationResult> {
  const result = new ValidationResult(`Table Existence: ${table}`);
  try {
    if (await warehouse.tableExists(schema, table)) {
      result.addInfo(`Table exists with ${fmt(await warehouse.countRows(schema, table))} rows`);
    } else {
      result.addError(`Table ${qualifiedName(schema, table)} not found`);
    }
  } catch (error) {
    result.addError(`Error checking table: ${errorMessage(error)}`);
  }
  return result;
}

export async function checkRowCount(
  warehouse: Warehouse,
  schema: string,
  table: string,
  expected: [number, number]
): Promise<ValidationResult> {
  try {
    return evaluateRowCount(table, await warehouse.countRows(schema, table), expected);
  } catch (error) {
    const result = new ValidationResult(`Row Count: ${table}`);
    result.addError(`Error checking row count: ${errorMessage(error)}`);
    return result;
  }
}

export async function checkFipsValidity(warehouse: Warehouse, schema: string, table: string): Promise<ValidationResult> {
  const result = new ValidationResult(`FIPS Validity: ${table}`);
  const source = qualifiedName(schema, table);

  try {
    const rows = await warehouse.query(
      `SELECT COUNT(*) AS null_count FROM ${source}
       WHERE fips IS NULL OR LTRIM(RTRIM(CAST(fips AS NVARCHAR(20)))) = ''`
    );
    const nullCount = num(rows[0]?.['null_count']);
    if (nullCount > 0) {
      result.addError(`${fmt(nullCount)} rows have NULL or empty FIPS codes`);
    } else {
      result.addInfo('All rows have FIPS codes');
    }
  } catch (error) {
    result.addWarning(`Could not check FIPS nulls (field may not exist): ${errorMessage(error)}`);
  }

  try {
    const rows = await warehouse.query(
      `SELECT LEN(CAST(fips AS NVARCHAR(20))) AS fips_length, COUNT(*) AS row_count
       FROM ${source}
       WHERE fips IS NOT NULL
       GROUP BY LEN(CAST(fips AS NVARCHAR(20)))
       ORDER BY row_count DESC`
    );
    for (const row of rows) {
      const length = num(row['fips_length']);
      const count = num(row['row_count']);
      if (length !== 5) {
        result.addWarning(`${fmt(count)} rows have FIPS length ${length} (expected 5)`);
      } else {
        result.addInfo(`${fmt(count)} rows have correct FIPS length (5)`);
      }
    }
  } catch (error) {
    result.addWarning(`Could not check FIPS format: ${errorMessage(error)}`);
  }

  return result;
}

async function readColumns(
  warehouse: Warehouse,
  schema: string,
  table: string,
  result: ValidationResult
): Promise<string[] | null> {
  try {
    return (await warehouse.getColumns(schema, table)).map(c => c.toLowerCase());
  } catch (error) {
    result.addWarning(`Could not read columns: ${errorMessage(error)}`);
    return null;
  }
}

export async function checkCriticalNulls(warehouse: Warehouse, schema: string, table: string): Promise<ValidationResult> {
  const result = new ValidationResult(`NULL Checks: ${table}`);
  const columns = await readColumns(warehouse, schema, table, result);
  if (columns === null) {
    return result;
  }
  const present = CRITICAL_FIELDS.filter(field => columns.includes(field));

  if (present.length === 0) {
    result.addWarning('No critical fields found in table');
    return result;
  }

  for (const field of present) {
    try {
      const rows = await warehouse.query(
        `SELECT SUM(CASE WHEN ${field} IS NULL THEN 1 ELSE 0 END) AS null_count, COUNT(*) AS total_count
         FROM ${qualifiedName(schema, table)}`
      );
      const nullCount = num(rows[0]?.['null_count']);
      const total = num(rows[0]?.['total_count']);
      if (nullCount > 0) {
        const pct = total > 0 ? (nullCount / total) * 100 : 0;
        result.addError(`${field}: ${fmt(nullCount)} NULLs (${pct.toFixed(1)}%)`);
      } else {
        result.addInfo(`${field}: No NULLs`);
      }
    } catch (error) {
      result.addWarning(`Could not check ${field}: ${errorMessage(error)}`);
    }
  }

  return result;
}

export async function checkNegativeValues(warehouse: Warehouse, schema: string, table: string): Promise<ValidationResult> {
  const result = new ValidationResult(`Negative Values: ${table}`);
  const columns = await readColumns(warehouse, schema, table, result);
  if (columns === null) {
    return result;
  }
  const present = NON_NEGATIVE_FIELDS.filter(field => columns.includes(field));

  if (present.length === 0) {
    result.addInfo('No numeric fields to check');
    return result;
  }

  for (const field of present) {
    try {
      const rows = await warehouse.query(
        `SELECT COUNT(*) AS negative_count FROM ${qualifiedName(schema, table)}
         WHERE TRY_CAST(${field} AS FLOAT) < 0`
      );
      const negatives = num(rows[0]?.['negative_count']);
      if (negatives > 0) {
        result.addWarning(`${field}: ${fmt(negatives)} negative values`);
      }
    } catch (error) {
      result.addWarning(`Could not check ${field}: ${errorMessage(error)}`);
    }
  }

  if (result.warnings.length === 0) {
    result.addInfo('No negative values found in numeric fields');
  }
  return result;
}

function toDuplicateKeys(rows: Row[]): DuplicateKey[] {
  return rows.map(row => ({ value: String(row['fips']), count: num(row['dup_count']) }));
}

export async function checkDuplicateFips(warehouse: Warehouse, schema: string, table: string): Promise<ValidationResult> {
  try {
    const rows = await warehouse.query(
      `SELECT TOP 10 fips, COUNT(*) AS dup_count
       FROM ${qualifiedName(schema, table)}
       WHERE fips IS NOT NULL
       GROUP BY fips
       HAVING COUNT(*) > 1
       ORDER BY dup_count DESC`
    );
    return evaluateDuplicates(table, toDuplicateKeys(rows));
  } catch (error) {
    const result = new ValidationResult(`Duplicate FIPS: ${table}`);
    result.addWarning(`Could not check for duplicates: ${errorMessage(error)}`);
    return result;
  }
}

export async function compareToPreviousYear(
  warehouse: Warehouse,
  sectionCode: string,
  current: { year: string; schema: string; table: string },
  previous: { year: string; schema: string; table: string }
): Promise<ValidationResult> {
  try {
    if (!(await warehouse.tableExists(previous.schema, previous.table))) {
      const result = new ValidationResult(`Year-over-Year Comparison: ${sectionCode}`);
      result.addInfo(`Previous year (${previous.year}) not found for comparison`);
      return result;
    }
    return evaluateYearOverYear(
      sectionCode,
      { year: current.year, rows: await warehouse.countRows(current.schema, current.table) },
      { year: previous.year, rows: await warehouse.countRows(previous.schema, previous.table) }
    );
  } catch (error) {
    const result = new ValidationResult(`Year-over-Year Comparison: ${sectionCode}`);
    result.addWarning(`Could not compare with ${previous.year}: ${errorMessage(error)}`);
    return result;
  }
}

export interface SectionCheckOptions {
  year: string;
  /** Earlier year to compare row counts with. */
  compareTo?: string;
}

/**
 * Every post-load check for one section's year table. The table-existence check
 * gates the rest; a query error is recorded in the check it belongs to.
 */
export async function runSectionChecks(
  warehouse: Warehouse,
  section: SourceSection,
  options: SectionCheckOptions
): Promise<ValidationResult[]> {
  const schema = yearSchemaName(options.year);
  const table = yearTableName(options.year, section.sectionCode);

  const exists = await checkTableExists(warehouse, schema, table);
  if (!exists.passed) {
    return [exists];
  }

  const checks = [
    exists,
    await checkRowCount(warehouse, schema, table, section.expectedRows),
    await checkFipsValidity(warehouse, schema, table),
    await checkCriticalNulls(warehouse, schema, table),
    await checkNegativeValues(warehouse, schema, table),
    await checkDuplicateFips(warehouse, schema, table),
  ];
  if (options.compareTo) {
    checks.push(
      await compareToPreviousYear(
        warehouse,
        section.sectionCode,
        { year: options.year, schema, table },
        {
          year: options.compareTo,
          schema: yearSchemaName(options.compareTo),
          table: yearTableName(options.compareTo, section.sectionCode),
        }
      )
    );
  }
  return checks;
}

/**
 * Rows a union view returns for one year; 0 means the view still needs the year added.
 */
export async function countViewRowsForYear(
  warehouse: Warehouse,
  schema: string,
  view: string,
  year: string
): Promise<number> {
  const rows = await warehouse.query(
    `SELECT COUNT(*) AS row_count FROM ${qualifiedName(schema, view)} WHERE election_year = @year`,
    { year }
  );
  return num(rows[0]?.['row_count']);
}
