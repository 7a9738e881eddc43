/**
 * Load EAVS data for a specific year
 *
 * Steps: upload (CSV → blob), tables (BULK INSERT into eavs_<year>), views (add the
 * year to the union views), materialize (rebuild stg_* tables), validate.
 *
 * Usage:
 *   npx tsx scripts/load-eavs-year.ts 2024 /path/to/2024
 *   npx tsx scripts/load-eavs-year.ts 2024 /path/to/2024 --step views --dry-run
 *   npx tsx scripts/load-eavs-year.ts 2024 /path/to/2024 --step materialize
 */

import * as dotenv from 'dotenv';
dotenv.config();

import * as fs from 'fs';
import { CliArgs, runCli } from './lib/cli-args';
import { getBlobSettings, loadConfig, printConfig, validateConfig } from './lib/config-loader';
import { ConfigError } from './lib/error-handler';
import { MappingStore } from './lib/mapping-store';
import { BlobObjectStore } from './lib/object-store';
import { ProgressReporter } from './lib/progress-reporter';
import { parseSourceSections, parseViewTargets } from './lib/sections';
import { SqlServerWarehouse } from './lib/warehouse';
import { EavsYearLoader, parseLoadStep } from './lib/year-loader';

async function main(): Promise<number> {
  const args = CliArgs.fromProcess(['step', 'config', 'manual-dir']);
  const year = args.year(0);
  const dataDir = args.positionalAt(1, 'data_dir');
  const dryRun = args.has('dry-run');
  const step = parseLoadStep(args.option('step') ?? 'all');
  if (!step) {
    throw new ConfigError(`--step must be one of upload, tables, views, materialize, validate, all`);
  }
  if (!fs.existsSync(dataDir)) {
    throw new ConfigError(`Data directory not found: ${dataDir}`);
  }

  const config = loadConfig({ configPath: args.option('config') });
  const { valid, errors } = validateConfig(config, { warehouse: true, storage: true });
  if (!valid) {
    throw new ConfigError(errors.join('\n'));
  }
  if (args.has('debug')) {
    printConfig(config);
  }

  const store = MappingStore.fromDocument(config.document);
  const blob = getBlobSettings(config);
  const retry = { maxRetries: config.retry.maxRetries, baseDelay: config.retry.baseDelay };
  const reporter = new ProgressReporter(args.has('debug'));
  const warehouse = await SqlServerWarehouse.connect(config);

  try {
    const loader = new EavsYearLoader(
      {
        store,
        sections: parseSourceSections(config.document),
        targets: parseViewTargets(config.document),
        warehouse,
        objectStore: BlobObjectStore.fromSettings(blob, retry),
        blob,
        global: config.global,
        reporter,
      },
      {
        year,
        dataDir,
        manualDir: args.option('manual-dir') ?? config.paths.manualReviewDir,
        dryRun,
      }
    );

    const results = await loader.run(step);
    results.printSummary();
    reporter.logRunComplete(`EAVS ${year} Load`, {
      succeeded: results.count('success'),
      warnings: results.count('warning'),
      failed: results.count('failed'),
    });

    if (!results.hasFailures()) {
      console.log('📋 Next steps:');
      console.log(`  1. npx tsx scripts/postload-validation.ts ${year}`);
      console.log(`  2. npx tsx scripts/validate-year.ts ${year}`);
    }
    return results.exitCode();
  } finally {
    await warehouse.close();
  }
}

runCli(main);
