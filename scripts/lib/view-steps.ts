import { GlobalSettings } from './config-loader';
import { errorMessage } from './error-handler';
import { MappingStore } from './mapping-store';
import { ProgressReporter } from './progress-reporter';
import { BatchResults } from './results';
import { ViewTarget } from './sections';
import { refreshStagingTable } from './staging';
import { updateUnionView } from './view-updater';
import { Warehouse } from './warehouse';

/**
 * The view and staging-table steps shared by the year and denominator loaders
 */

export interface ViewStepContext {
  store: MappingStore;
  targets: ViewTarget[];
  warehouse: Warehouse;
  global: GlobalSettings;
  reporter: ProgressReporter;
  results: BatchResults;
  year: string;
  manualDir: string;
  dryRun?: boolean;
}

/** Add the year to each target's union view, recording one item per view. */
export async function runViewUpdates(ctx: ViewStepContext): Promise<void> {
  const { reporter, results, year } = ctx;

  for (const target of ctx.targets) {
    reporter.logItem(target.viewName);

    if (!ctx.store.hasMappingKey(target.mappingKey)) {
      reporter.logError(`No ${target.mappingKey} section in config`);
      results.failure('views', target.viewName, `No ${target.mappingKey} section in config`);
      continue;
    }

    try {
      const update = await updateUnionView(ctx.warehouse, ctx.store, target, year, {
        manualDir: ctx.manualDir,
        dryRun: ctx.dryRun,
        ctx: ctx.global,
      });

      switch (update.status) {
        case 'created':
          reporter.logSuccess(`Created view with ${year}`);
          results.success('views', target.viewName);
          break;
        case 'patched':
          reporter.logSuccess(`Added ${year}`);
          results.success('views', target.viewName);
          break;
        case 'already_present':
          reporter.logInfo(`${year} already present`);
          results.success('views', target.viewName);
          break;
        case 'preview':
          reporter.logInfo(`[dry-run] preview saved to ${update.savedTo}`);
          results.skipped('views', target.viewName, 'dry run');
          break;
        case 'failed':
          reporter.logError(`${update.reason}`);
          if (update.savedTo) {
            reporter.logWarning(`View left unchanged; SQL saved for manual review: ${update.savedTo}`);
          }
          results.failure('views', target.viewName, `unverified: ${update.reason}`);
          break;
      }
    } catch (error) {
      reporter.logError(errorMessage(error));
      results.failure('views', target.viewName, errorMessage(error));
    }
  }
}

/** Rebuild each target's staging table from its view. */
export async function runMaterialize(ctx: ViewStepContext): Promise<void> {
  const { reporter, results } = ctx;

  for (const target of ctx.targets) {
    reporter.logItem(`${target.stagingTable} ← ${target.viewName}`);

    if (ctx.dryRun) {
      reporter.logInfo('[dry-run] refresh skipped');
      results.skipped('materialize', target.stagingTable, 'dry run');
      continue;
    }

    try {
      const rows = await refreshStagingTable(ctx.warehouse, ctx.global.analyticsDataset, target);
      reporter.logRows(target.stagingTable, rows);
      results.success('materialize', target.stagingTable, rows);
    } catch (error) {
      reporter.logError(errorMessage(error));
      results.failure('materialize', target.stagingTable, errorMessage(error));
    }
  }
}
