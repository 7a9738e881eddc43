/**
 * Backup EAVS staging tables to CSV, one file per table and year
 *
 * Usage:
 *   npx tsx scripts/backup-staging-tables.ts
 *   npx tsx scripts/backup-staging-tables.ts --years 2016,2018 --output data/backups/staging_tables
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { CliArgs, runCli } from './lib/cli-args';
import { loadConfig, validateConfig } from './lib/config-loader';
import { ConfigError, errorMessage } from './lib/error-handler';
import { MappingStore } from './lib/mapping-store';
import { ProgressReporter } from './lib/progress-reporter';
import { BatchResults } from './lib/results';
import { isYear, parseViewTargets } from './lib/sections';
import { backupTimestamp, exportStagingYear } from './lib/staging';
import { SqlServerWarehouse } from './lib/warehouse';

async function main(): Promise<number> {
  const args = CliArgs.fromProcess(['output', 'config'], ['years']);

  const config = loadConfig({ configPath: args.option('config') });
  const { valid, errors } = validateConfig(config, { warehouse: true });
  if (!valid) {
    throw new ConfigError(errors.join('\n'));
  }

  const store = MappingStore.fromDocument(config.document);
  const targets = parseViewTargets(config.document);
  const requestedYears = args.list('years');
  const badYears = requestedYears.filter(y => !isYear(y));
  if (badYears.length > 0) {
    throw new ConfigError(`--years takes four-digit years, got ${badYears.join(', ')}`);
  }

  const backupDir = args.option('output') ?? config.paths.backupDir;
  const schema = config.global.analyticsDataset;
  const timestamp = backupTimestamp();
  const reporter = new ProgressReporter();
  const results = new BatchResults();

  reporter.logRunStart('EAVS Staging Table Backup', {
    'Backup dir': backupDir,
    Years: requestedYears.length > 0 ? requestedYears.join(', ') : 'all mapped years',
    Tables: targets.length,
  });

  const warehouse = await SqlServerWarehouse.connect(config);
  let totalRows = 0;

  try {
    for (const target of targets) {
      reporter.logItem(`Backing up: ${target.stagingTable}`);
      const years = requestedYears.length > 0 ? requestedYears : store.getYears(target.mappingKey);

      for (const year of years) {
        const item = `${target.stagingTable} ${year}`;
        try {
          const backup = await exportStagingYear(warehouse, schema, target.stagingTable, year, backupDir, timestamp);
          reporter.logSuccess(`Backed up ${backup.rows.toLocaleString('en-US')} rows to ${backup.filePath}`);
          results.success('backup', item, backup.rows);
          totalRows += backup.rows;
        } catch (error) {
          reporter.logError(`Failed to backup ${item}: ${errorMessage(error)}`);
          results.failure('backup', item, errorMessage(error));
        }
      }
    }
  } finally {
    await warehouse.close();
  }

  results.printSummary();
  reporter.logRunComplete('Staging table backup', {
    succeeded: results.count('success'),
    warnings: 0,
    failed: results.count('failed'),
  });
  console.log(`Total rows backed up: ${totalRows.toLocaleString('en-US')}`);
  return results.exitCode();
}

runCli(main);
