/**
 * Generate Union View SQL
 * Writes one CREATE OR ALTER VIEW file per union view from config/field-mappings.json
 *
 * Usage:
 *   npx tsx scripts/generate-union-views.ts
 *   npx tsx scripts/generate-union-views.ts --format cte --output sql/generated
 *   npx tsx scripts/generate-union-views.ts --deploy     # also run the files against SQL Server
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { CliArgs, runCli } from './lib/cli-args';
import { loadConfig, validateConfig } from './lib/config-loader';
import { ConfigError } from './lib/error-handler';
import { MappingStore } from './lib/mapping-store';
import { ProgressReporter } from './lib/progress-reporter';
import { BatchResults } from './lib/results';
import { parseViewTargets } from './lib/sections';
import { executeSQLScripts } from './lib/sql-executor';
import { ViewFormat, writeGeneratedViews } from './lib/union-generator';
import { SqlServerWarehouse } from './lib/warehouse';

function parseFormat(value: string | undefined): ViewFormat {
  if (value === undefined || value === 'union' || value === 'cte') {
    return value ?? 'union';
  }
  throw new ConfigError(`--format must be "union" or "cte", got "${value}"`);
}

async function main(): Promise<number> {
  const args = CliArgs.fromProcess(['config', 'output', 'format']);
  const format = parseFormat(args.option('format'));
  const deploy = args.has('deploy');

  const config = loadConfig({ configPath: args.option('config') });
  const { valid, errors } = validateConfig(config, { warehouse: deploy });
  if (!valid) {
    throw new ConfigError(errors.join('\n'));
  }

  const store = MappingStore.fromDocument(config.document);
  const targets = parseViewTargets(config.document);
  const outputDir = args.option('output') ?? config.paths.generatedDir;
  const reporter = new ProgressReporter();
  const results = new BatchResults();

  reporter.logRunStart('Generating Union View SQL Files', {
    Config: config.configPath,
    Output: outputDir,
    Format: format,
  });

  const written = writeGeneratedViews(store, targets, outputDir, { format, ctx: config.global });

  for (const view of written) {
    reporter.logItem(view.target.viewName);
    view.skipped.forEach(s => reporter.logWarning(`${s.year} skipped: ${s.reason}`));
    if (view.success) {
      reporter.logSuccess(`Generated ${view.outputPath} (${view.years.join(', ')})`);
      results.success('generate', view.target.viewName);
    } else {
      reporter.logError(`${view.error}`);
      results.failure('generate', view.target.viewName, view.error ?? 'generation failed');
    }
  }

  if (deploy) {
    const scripts = written.filter(v => v.success).map(v => v.outputPath);
    const warehouse = await SqlServerWarehouse.connect(config);
    try {
      const executed = await executeSQLScripts(warehouse, scripts, (name, index, total) =>
        reporter.logInfo(`[${index}/${total}] Deploying ${name}`)
      );
      for (const result of executed) {
        if (result.success) {
          results.success('deploy', result.scriptPath);
        } else {
          reporter.logError(`${result.scriptPath}: ${result.error}`);
          results.failure('deploy', result.scriptPath, result.error ?? 'deploy failed');
        }
      }
    } finally {
      await warehouse.close();
    }
  } else {
    reporter.logInfo('Review the generated files, then deploy with --deploy');
  }

  results.printSummary();
  reporter.logRunComplete('Union view generation', {
    succeeded: results.count('success'),
    warnings: written.reduce((sum, v) => sum + v.skipped.length, 0),
    failed: results.count('failed'),
  });
  return results.exitCode();
}

runCli(main);
