/**
 * Post-Load Validation for EAVS Data
 * Row counts, FIPS validity, critical NULLs, negative counts, duplicate FIPS and
 * an optional year-over-year comparison for each loaded section table
 *
 * Usage:
 *   npx tsx scripts/postload-validation.ts 2024
 *   npx tsx scripts/postload-validation.ts 2024 --compare-to 2022
 *   npx tsx scripts/postload-validation.ts 2024 --sections a_reg c_mail
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { CliArgs, runCli } from './lib/cli-args';
import { loadConfig, validateConfig } from './lib/config-loader';
import { ConfigError } from './lib/error-handler';
import { ProgressReporter } from './lib/progress-reporter';
import { isYear, parseSourceSections, yearSchemaName } from './lib/sections';
import { runSectionChecks, summarizeValidation, ValidationResult } from './lib/validation-checks';
import { SqlServerWarehouse } from './lib/warehouse';

async function main(): Promise<number> {
  const args = CliArgs.fromProcess(['compare-to', 'config'], ['sections']);
  const year = args.year(0);
  const compareTo = args.option('compare-to');
  if (compareTo !== undefined && !isYear(compareTo)) {
    throw new ConfigError(`--compare-to must be a four-digit year, got "${compareTo}"`);
  }

  const config = loadConfig({ configPath: args.option('config') });
  const { valid, errors } = validateConfig(config, { warehouse: true });
  if (!valid) {
    throw new ConfigError(errors.join('\n'));
  }

  const requested = args.list('sections');
  const allSections = parseSourceSections(config.document);
  const sections = requested.length > 0 ? allSections.filter(s => requested.includes(s.sectionCode)) : allSections;
  const unknown = requested.filter(code => !allSections.some(s => s.sectionCode === code));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown section(s): ${unknown.join(', ')}`);
  }

  const schema = yearSchemaName(year);
  const reporter = new ProgressReporter();
  reporter.logRunStart('EAVS Data Post-Load Validation', {
    Year: year,
    Schema: schema,
    Sections: sections.map(s => s.sectionCode).join(', '),
  });

  const warehouse = await SqlServerWarehouse.connect(config);
  const allResults: ValidationResult[] = [];

  try {
    for (const section of sections) {
      reporter.logItem(`Section: ${section.sectionCode.toUpperCase()}`);
      const checks = await runSectionChecks(warehouse, section, { year, compareTo });
      checks.forEach(check => check.print());
      allResults.push(...checks);
    }
  } finally {
    await warehouse.close();
  }

  const summary = summarizeValidation(allResults);
  console.log(`\nChecks: ${summary.passedChecks}/${summary.totalChecks} passed`);
  console.log(`Warnings: ${summary.warnings}`);
  console.log(`Errors: ${summary.errors}`);

  reporter.logRunComplete('Post-load validation', {
    succeeded: summary.passedChecks,
    warnings: summary.warnings,
    failed: summary.totalChecks - summary.passedChecks,
  });

  if (summary.passedChecks < summary.totalChecks) {
    console.log('❌ VALIDATION FAILED - fix critical errors before proceeding.');
    return 1;
  }
  if (summary.warnings > 0) {
    console.log('⚠️  VALIDATION PASSED WITH WARNINGS - review warnings above.');
  } else {
    console.log('✅ ALL VALIDATION CHECKS PASSED');
  }
  return 0;
}

runCli(main);
