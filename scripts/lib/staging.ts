import * as fs from 'fs';
import * as path from 'path';
import { qualifiedName, ViewTarget } from './sections';
import { Warehouse } from './warehouse';

/**
 * Staging tables: snapshots of the union views, and CSV backups of them per year
 */

function formatDateForCsv(value: Date): string {
  return value.toISOString().replace('T', ' ').replace('Z', '');
}

export function escapeCsvValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'boolean') return value ? '1' : '0';
  const raw = value instanceof Date ? formatDateForCsv(value) : String(value);
  if (raw.includes('"')) {
    return `"${raw.replace(/"/g, '""')}"`;
  }
  if (/[,\n\r]/.test(raw)) {
    return `"${raw}"`;
  }
  return raw;
}

export function toCsv(headers: string[], rows: unknown[][]): string {
  const lines = [headers.map(escapeCsvValue).join(',')];
  for (const row of rows) {
    lines.push(row.map(escapeCsvValue).join(','));
  }
  return lines.join('\n') + '\n';
}

export function writeCsvFile(filePath: string, headers: string[], rows: unknown[][]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, toCsv(headers, rows));
}

/** YYYYMMDD, as used in backup file names. */
export function backupTimestamp(date: Date = new Date()): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

export function backupFileName(table: string, year: string, timestamp: string): string {
  return `${table}_${year}_${timestamp}.csv`;
}

/**
 * Rebuild a view's staging table (DROP + SELECT INTO)
 */
export async function refreshStagingTable(warehouse: Warehouse, schema: string, target: ViewTarget): Promise<number> {
  return warehouse.materializeView(schema, target.viewName, target.stagingTable);
}

export interface BackupResult {
  filePath: string;
  rows: number;
}

/**
 * Export one year of a staging table to `<backupDir>/<table>_<year>_<timestamp>.csv`
 */
export async function exportStagingYear(
  warehouse: Warehouse,
  schema: string,
  table: string,
  year: string,
  backupDir: string,
  timestamp: string = backupTimestamp()
): Promise<BackupResult> {
  const columns = await warehouse.getColumns(schema, table);
  if (columns.length === 0) {
    throw new Error(`Table ${qualifiedName(schema, table)} not found`);
  }

  const records = await warehouse.query(
    `SELECT * FROM ${qualifiedName(schema, table)} WHERE election_year = @year`,
    { year }
  );
  const rows = records.map(record => columns.map(column => record[column]));

  const filePath = path.join(backupDir, backupFileName(table, year, timestamp));
  writeCsvFile(filePath, columns, rows);
  return { filePath, rows: rows.length };
}
