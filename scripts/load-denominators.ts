/**
 * Load a year of population denominators (VEP, ACS CVAP)
 *
 * Each denominator view takes its CSV through `--<section code>-csv`. Steps: upload
 * (CSV → blob), tables (BULK INSERT into the view's source table), views (add the
 * year block to the union view), materialize (rebuild the stg_* table).
 *
 * Usage:
 *   npx tsx scripts/load-denominators.ts 2024 --vep-csv ./vep_2024.csv --acs-csv ./acs_2024.csv
 *   npx tsx scripts/load-denominators.ts 2024 --step views --dry-run
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { CliArgs, runCli } from './lib/cli-args';
import { getBlobSettings, loadConfig, printConfig, validateConfig } from './lib/config-loader';
import { DENOMINATOR_STEPS, DenominatorLoader, parseDenominatorStep } from './lib/denominator-loader';
import { ConfigError } from './lib/error-handler';
import { MappingStore } from './lib/mapping-store';
import { BlobObjectStore } from './lib/object-store';
import { ProgressReporter } from './lib/progress-reporter';
import { parseDenominatorTargets } from './lib/sections';
import { SqlServerWarehouse } from './lib/warehouse';

const FIXED_OPTIONS = ['step', 'config', 'manual-dir'];

async function main(): Promise<number> {
  // The CSV options depend on the targets in the config, so --config is read first.
  const configPath = CliArgs.fromProcess(FIXED_OPTIONS).option('config');
  const config = loadConfig({ configPath });
  const targets = parseDenominatorTargets(config.document);

  const args = CliArgs.fromProcess([...FIXED_OPTIONS, ...targets.map(t => `${t.sectionCode}-csv`)]);
  const year = args.year(0);
  const dryRun = args.has('dry-run');
  const step = parseDenominatorStep(args.option('step') ?? 'all');
  if (!step) {
    throw new ConfigError(`--step must be one of ${DENOMINATOR_STEPS.join(', ')}, all`);
  }

  const files: Record<string, string> = {};
  for (const target of targets) {
    const file = args.option(`${target.sectionCode}-csv`);
    if (file !== undefined) {
      files[target.sectionCode] = file;
    }
  }

  const { valid, errors } = validateConfig(config, { warehouse: true, storage: true });
  if (!valid) {
    throw new ConfigError(errors.join('\n'));
  }
  if (args.has('debug')) {
    printConfig(config);
  }

  const blob = getBlobSettings(config);
  const retry = { maxRetries: config.retry.maxRetries, baseDelay: config.retry.baseDelay };
  const reporter = new ProgressReporter(args.has('debug'));
  const warehouse = await SqlServerWarehouse.connect(config);

  try {
    const loader = new DenominatorLoader(
      {
        store: MappingStore.fromDocument(config.document),
        targets,
        warehouse,
        objectStore: BlobObjectStore.fromSettings(blob, retry),
        blob,
        global: config.global,
        reporter,
      },
      {
        year,
        files,
        manualDir: args.option('manual-dir') ?? config.paths.manualReviewDir,
        dryRun,
      }
    );

    const results = await loader.run(step);
    results.printSummary();
    reporter.logRunComplete(`Denominators ${year} Load`, {
      succeeded: results.count('success'),
      warnings: results.count('warning'),
      failed: results.count('failed'),
    });
    return results.exitCode();
  } finally {
    await warehouse.close();
  }
}

runCli(main);
