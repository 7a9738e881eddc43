/**
 * Validate field mappings against a year's CSV headers
 * Suggested corrections are written to a separate file; the config is never modified.
 *
 * Usage:
 *   npx tsx scripts/validate-mappings.ts 2024 /path/to/2024
 *   npx tsx scripts/validate-mappings.ts 2024 /path/to/2024 --output config/corrected-2024.json
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { CliArgs, runCli } from './lib/cli-args';
import { loadConfig } from './lib/config-loader';
import { readCsvHeaders } from './lib/csv-inspector';
import {
  buildCorrectedMappings,
  hasMappingProblems,
  printMappingReport,
  SectionMappingReport,
  validateSectionMappings,
  writeCorrectedMappings,
} from './lib/mapping-validator';
import { MappingStore } from './lib/mapping-store';
import { ProgressReporter } from './lib/progress-reporter';
import { parseSourceSections, parseViewTargets } from './lib/sections';
import { resolveSourceFile } from './lib/source-files';

async function main(): Promise<number> {
  const args = CliArgs.fromProcess(['output', 'config']);
  const year = args.year(0);
  const dataDir = args.positionalAt(1, 'data_dir');
  const outputPath = args.option('output');

  const config = loadConfig({ configPath: args.option('config') });
  const store = MappingStore.fromDocument(config.document);
  const sections = parseSourceSections(config.document);
  const reporter = new ProgressReporter();

  reporter.logRunStart(`EAVS ${year} Field Mapping Validation`, { 'Data dir': dataDir, Year: year });

  const reports: SectionMappingReport[] = [];
  for (const target of parseViewTargets(config.document)) {
    const section = sections.find(s => s.sectionCode === target.sectionCode);
    const resolved = section ? resolveSourceFile(dataDir, section, year) : null;

    let report: SectionMappingReport;
    if (!resolved) {
      report = validateSectionMappings(store, target, year, []);
      report.error = `Could not find the CSV for section ${target.sectionCode}`;
    } else {
      report = validateSectionMappings(store, target, year, readCsvHeaders(resolved.path), resolved.path);
    }
    printMappingReport(report);
    reports.push(report);
  }

  console.log('\n📋 Summary');
  for (const report of reports) {
    if (report.error) {
      console.log(`  ${report.sectionCode.toUpperCase()}: ${report.error}`);
      continue;
    }
    console.log(
      `  ${report.sectionCode.toUpperCase()}: ${Object.keys(report.invalid).length} invalid, ` +
        `${report.missing.length} missing, ${Object.keys(report.suggestions).length} suggested fixes`
    );
  }

  if (outputPath) {
    writeCorrectedMappings(outputPath, buildCorrectedMappings(reports));
    reporter.logSuccess(`Suggested mappings written to ${outputPath} (review before copying into the config)`);
  }

  return reports.some(hasMappingProblems) ? 1 : 0;
}

runCli(main);
