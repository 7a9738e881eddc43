import * as fs from 'fs';
import { parse } from 'csv-parse/sync';

/**
 * CSV inspection for the load step: headers, rows, line endings and
 * SQL Server column types inferred from the values.
 */

export type SqlColumnType = 'BIGINT' | 'FLOAT' | 'NVARCHAR(MAX)';

export interface ColumnDefinition {
  /** Header as it appears in the file. */
  sourceName: string;
  /** Column name in the warehouse table. */
  name: string;
  sqlType: SqlColumnType;
}

export interface CsvTable {
  headers: string[];
  rows: string[][];
}

/** BULK INSERT row terminator. */
export type RowTerminator = '0x0A' | '0x0D0A';

const INTEGER = /^-?(0|[1-9]\d{0,17})$/;
const DECIMAL = /^-?((0|[1-9]\d*)(\.\d+)?|\.\d+)([eE][+-]?\d+)?$/;

function toRows(parsed: unknown): string[][] {
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.map((row: unknown) => (Array.isArray(row) ? row.map(cell => String(cell)) : []));
}

/**
 * Parse a CSV file. The first record is the header; `maxRows` limits the data rows read.
 */
export function readCsvTable(filePath: string, maxRows?: number): CsvTable {
  const content = fs.readFileSync(filePath, 'utf-8');
  const records = toRows(
    parse(content, {
      bom: true,
      columns: false,
      skip_empty_lines: true,
      relax_column_count: true,
      to_line: maxRows === undefined ? undefined : maxRows + 1,
    })
  );

  const [header = [], ...rows] = records;
  return { headers: header.map(h => h.trim()), rows };
}

export function readCsvHeaders(filePath: string): string[] {
  return readCsvTable(filePath, 0).headers;
}

/** Row terminator of the file, from its first line break. */
export function detectRowTerminator(filePath: string): RowTerminator {
  const content = fs.readFileSync(filePath, 'utf-8');
  const newline = content.indexOf('\n');
  return newline > 0 && content[newline - 1] === '\r' ? '0x0D0A' : '0x0A';
}

/**
 * Sanitize column name for SQL Server
 */
export function sanitizeColumnName(name: string, index: number): string {
  let cleaned = name.replace(/^\uFEFF/, '').trim();
  cleaned = cleaned.replace(/[^a-zA-Z0-9_]/g, '_');
  if (/^[0-9]/.test(cleaned)) {
    cleaned = 'Col_' + cleaned;
  }
  return cleaned || `Column${index}`;
}

/** Sanitized, case-insensitively unique column names. */
export function sanitizeColumnNames(headers: string[]): string[] {
  const seen = new Set<string>();
  return headers.map((header, index) => {
    const base = sanitizeColumnName(header, index);
    let name = base;
    let suffix = 2;
    while (seen.has(name.toLowerCase())) {
      name = `${base}_${suffix++}`;
    }
    seen.add(name.toLowerCase());
    return name;
  });
}

/**
 * Warehouse type for a column's values. Blank values are ignored. Integers with a
 * leading zero (FIPS codes such as 01001) are text.
 */
export function inferColumnType(values: string[]): SqlColumnType {
  const present = values.map(v => v.trim()).filter(v => v !== '');
  if (present.length === 0) {
    return 'NVARCHAR(MAX)';
  }
  if (present.every(v => INTEGER.test(v))) {
    return 'BIGINT';
  }
  if (present.every(v => DECIMAL.test(v))) {
    return 'FLOAT';
  }
  return 'NVARCHAR(MAX)';
}

export function inferColumnDefinitions(table: CsvTable): ColumnDefinition[] {
  const names = sanitizeColumnNames(table.headers);
  return table.headers.map((sourceName, index) => ({
    sourceName,
    name: names[index],
    sqlType: inferColumnType(table.rows.map(row => row[index] ?? '')),
  }));
}
