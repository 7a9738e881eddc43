/**
 * Pre-Flight Validation for EAVS Data
 * Checks a year's CSV files against the field mappings before loading
 *
 * Usage:
 *   npx tsx scripts/preflight-validation.ts 2024 /path/to/2024
 *   npx tsx scripts/preflight-validation.ts 2024 /path/to/2024 --strict
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { CliArgs, runCli } from './lib/cli-args';
import { loadConfig } from './lib/config-loader';
import { MappingStore } from './lib/mapping-store';
import { runPreflight } from './lib/preflight';
import { ProgressReporter } from './lib/progress-reporter';
import { parseSourceSections, parseViewTargets } from './lib/sections';
import { summarizeValidation } from './lib/validation-checks';

async function main(): Promise<number> {
  const args = CliArgs.fromProcess(['config']);
  const year = args.year(0);
  const dataDir = args.positionalAt(1, 'data_dir');
  const strict = args.has('strict');

  const config = loadConfig({ configPath: args.option('config') });
  const store = MappingStore.fromDocument(config.document);
  const reporter = new ProgressReporter();

  reporter.logRunStart('EAVS Pre-Flight Validation', {
    Year: year,
    'Data dir': dataDir,
    Mode: strict ? 'STRICT' : 'NORMAL',
  });

  const results = runPreflight(store, parseSourceSections(config.document), parseViewTargets(config.document), {
    year,
    dataDir,
    strict,
  });
  results.forEach(result => result.print());

  const summary = summarizeValidation(results);
  reporter.logRunComplete('Pre-flight validation', {
    succeeded: summary.passedChecks,
    warnings: summary.warnings,
    failed: summary.totalChecks - summary.passedChecks,
  });

  if (summary.passedChecks === summary.totalChecks) {
    console.log(`Ready to load: npx tsx scripts/load-eavs-year.ts ${year} ${dataDir}`);
    return 0;
  }
  console.log('Fix the errors above (or the mappings in config/field-mappings.json) before loading.');
  return 1;
}

runCli(main);
