import * as fs from 'fs';
import * as path from 'path';
import { BlobSettings, GlobalSettings } from './config-loader';
import { detectRowTerminator, inferColumnDefinitions, readCsvTable } from './csv-inspector';
import { errorMessage } from './error-handler';
import { MappingStore } from './mapping-store';
import { ObjectStore } from './object-store';
import { ProgressReporter } from './progress-reporter';
import { BatchResults } from './results';
import { resolveSourceTable, ViewTarget } from './sections';
import { runMaterialize, runViewUpdates, ViewStepContext } from './view-steps';
import { Warehouse } from './warehouse';

export const DENOMINATOR_STEPS = ['upload', 'tables', 'views', 'materialize'] as const;
export type DenominatorStep = (typeof DENOMINATOR_STEPS)[number];

export function parseDenominatorStep(value: string): DenominatorStep | 'all' | null {
  if (value === 'all') {
    return 'all';
  }
  return DENOMINATOR_STEPS.find(step => step === value) ?? null;
}

export function denominatorBlobPath(year: string, sectionCode: string): string {
  return `denominators/${year}/${sectionCode}.csv`;
}

export interface DenominatorLoaderDeps {
  store: MappingStore;
  targets: ViewTarget[];
  warehouse: Warehouse;
  objectStore: ObjectStore;
  blob: BlobSettings;
  global: GlobalSettings;
  reporter?: ProgressReporter;
}

export interface DenominatorLoadOptions {
  year: string;
  /** Local CSV per target section code. Targets without a file keep their loaded table. */
  files: Record<string, string>;
  manualDir: string;
  dryRun?: boolean;
}

/**
 * Loads a year of population denominators (VEP, ACS CVAP): upload the CSVs, load
 * each into its target's source table, add the year to the denominator union views
 * and rebuild their staging tables.
 */
export class DenominatorLoader {
  readonly results = new BatchResults();
  private readonly reporter: ProgressReporter;

  constructor(
    private readonly deps: DenominatorLoaderDeps,
    private readonly options: DenominatorLoadOptions
  ) {
    this.reporter = deps.reporter ?? new ProgressReporter();
  }

  async run(step: DenominatorStep | 'all' = 'all'): Promise<BatchResults> {
    const steps: DenominatorStep[] = step === 'all' ? [...DENOMINATOR_STEPS] : [step];

    this.reporter.logRunStart(`Denominators ${this.options.year}`, {
      Views: this.deps.targets.map(t => t.viewName).join(', '),
      Steps: steps.join(', '),
      'Dry run': this.options.dryRun ? 'YES' : 'no',
    });

    for (let i = 0; i < steps.length; i++) {
      this.reporter.logStep(steps[i], i + 1, steps.length);
      await this.runStep(steps[i]);
    }

    return this.results;
  }

  private async runStep(step: DenominatorStep): Promise<void> {
    switch (step) {
      case 'upload':
        return this.uploadFiles();
      case 'tables':
        return this.loadTables();
      case 'views':
        return runViewUpdates(this.viewStepContext());
      case 'materialize':
        return runMaterialize(this.viewStepContext());
    }
  }

  private viewStepContext(): ViewStepContext {
    return {
      store: this.deps.store,
      targets: this.deps.targets,
      warehouse: this.deps.warehouse,
      global: this.deps.global,
      reporter: this.reporter,
      results: this.results,
      year: this.options.year,
      manualDir: this.options.manualDir,
      dryRun: this.options.dryRun,
    };
  }

  /** Targets with a CSV given; a missing path is a failure, no path at all a skip. */
  private locateFiles(step: string): Array<{ target: ViewTarget; filePath: string }> {
    const found: Array<{ target: ViewTarget; filePath: string }> = [];

    for (const target of this.deps.targets) {
      const filePath = this.options.files[target.sectionCode];
      if (filePath === undefined) {
        this.results.skipped(step, target.sectionCode, 'no file given');
      } else if (!fs.existsSync(filePath)) {
        this.reporter.logError(`File not found: ${filePath}`);
        this.results.failure(step, target.sectionCode, `File not found: ${filePath}`);
      } else {
        found.push({ target, filePath });
      }
    }
    return found;
  }

  async uploadFiles(): Promise<void> {
    const { year } = this.options;

    for (const { target, filePath } of this.locateFiles('upload')) {
      const blobPath = denominatorBlobPath(year, target.sectionCode);
      this.reporter.logItem(`${path.basename(filePath)} → ${this.deps.blob.containerName}/${blobPath}`);

      if (this.options.dryRun) {
        this.results.skipped('upload', target.sectionCode, 'dry run');
        continue;
      }

      try {
        await this.deps.objectStore.uploadFile(filePath, blobPath);
        this.reporter.logSuccess('Uploaded');
        this.results.success('upload', target.sectionCode);
      } catch (error) {
        this.reporter.logError(errorMessage(error));
        this.results.failure('upload', target.sectionCode, errorMessage(error));
      }
    }
  }

  async loadTables(): Promise<void> {
    const { year } = this.options;

    for (const { target, filePath } of this.locateFiles('tables')) {
      const { schema, table } = resolveSourceTable(target, year);
      this.reporter.logItem(`[${schema}].[${table}]`);

      try {
        const columns = inferColumnDefinitions(readCsvTable(filePath));

        if (this.options.dryRun) {
          this.reporter.logInfo(`[dry-run] would load ${columns.length} columns`);
          this.results.skipped('tables', table, 'dry run');
          continue;
        }

        const rows = await this.deps.warehouse.loadCsvFromBlob({
          schema,
          table,
          columns,
          blobPath: denominatorBlobPath(year, target.sectionCode),
          rowTerminator: detectRowTerminator(filePath),
          blob: this.deps.blob,
        });
        this.reporter.logRows(table, rows);
        this.results.success('tables', table, rows);
      } catch (error) {
        this.reporter.logError(errorMessage(error));
        this.results.failure('tables', table, errorMessage(error));
      }
    }
  }
}
