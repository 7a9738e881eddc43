/**
 * Quick check that a year is loaded: schema, section tables and union view rows
 *
 * Usage:
 *   npx tsx scripts/validate-year.ts 2024
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { CliArgs, runCli } from './lib/cli-args';
import { loadConfig, validateConfig } from './lib/config-loader';
import { ConfigError } from './lib/error-handler';
import { ProgressReporter } from './lib/progress-reporter';
import { parseSourceSections, parseViewTargets, yearSchemaName } from './lib/sections';
import { SqlServerWarehouse } from './lib/warehouse';
import { checkYearStatus } from './lib/year-status';

async function main(): Promise<number> {
  const args = CliArgs.fromProcess(['config']);
  const year = args.year(0);

  const config = loadConfig({ configPath: args.option('config') });
  const { valid, errors } = validateConfig(config, { warehouse: true });
  if (!valid) {
    throw new ConfigError(errors.join('\n'));
  }

  const reporter = new ProgressReporter();
  reporter.logRunStart(`Validating EAVS ${year} data`, { Schema: yearSchemaName(year) });

  const warehouse = await SqlServerWarehouse.connect(config);
  try {
    const results = await checkYearStatus(
      warehouse,
      {
        year,
        sections: parseSourceSections(config.document),
        targets: parseViewTargets(config.document),
        analyticsSchema: config.global.analyticsDataset,
      },
      reporter
    );
    results.printSummary();
    return results.exitCode();
  } finally {
    await warehouse.close();
  }
}

runCli(main);
