import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from './error-handler';
import { Warehouse } from './warehouse';

export interface SQLExecutionResult {
  scriptPath: string;
  success: boolean;
  batches: number;
  duration: number;
  error?: string;
}

/**
 * Split SQL text on GO batch separators (SQL Server requirement)
 */
export function splitBatches(sqlText: string): string[] {
  return sqlText
    .split(/^\s*GO\s*$/gim)
    .map(batch => batch.trim())
    .filter(batch => batch.length > 0);
}

/**
 * Execute a generated SQL file batch by batch. The warehouse retries transient errors.
 */
export async function executeSQLScript(warehouse: Warehouse, scriptPath: string): Promise<SQLExecutionResult> {
  const startTime = Date.now();
  let batches: string[] = [];

  try {
    batches = splitBatches(fs.readFileSync(scriptPath, 'utf-8'));
    console.log(`   ⚡ Executing ${batches.length} SQL batch(es) from ${path.basename(scriptPath)}...`);

    for (const batch of batches) {
      await warehouse.execute(batch);
    }

    return { scriptPath, success: true, batches: batches.length, duration: (Date.now() - startTime) / 1000 };
  } catch (error) {
    return {
      scriptPath,
      success: false,
      batches: batches.length,
      duration: (Date.now() - startTime) / 1000,
      error: errorMessage(error),
    };
  }
}

/**
 * Execute SQL scripts in sequence, continuing past failures
 */
export async function executeSQLScripts(
  warehouse: Warehouse,
  scripts: string[],
  onProgress?: (scriptName: string, index: number, total: number) => void
): Promise<SQLExecutionResult[]> {
  const results: SQLExecutionResult[] = [];

  for (let i = 0; i < scripts.length; i++) {
    if (onProgress) {
      onProgress(path.basename(scripts[i]), i + 1, scripts.length);
    }
    results.push(await executeSQLScript(warehouse, scripts[i]));
  }

  return results;
}
