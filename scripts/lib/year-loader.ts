import * as path from 'path';
import { BlobSettings, GlobalSettings } from './config-loader';
import { detectRowTerminator, inferColumnDefinitions, readCsvTable } from './csv-inspector';
import { errorMessage } from './error-handler';
import { MappingStore } from './mapping-store';
import { ObjectStore } from './object-store';
import { ProgressReporter } from './progress-reporter';
import { BatchResults } from './results';
import {
  blobPathFor,
  SourceSection,
  ViewTarget,
  yearSchemaName,
  yearTableName,
} from './sections';
import { resolveSourceFile } from './source-files';
import { checkDuplicateFips, checkRowCount, ValidationResult } from './validation-checks';
import { runMaterialize, runViewUpdates, ViewStepContext } from './view-steps';
import { Warehouse } from './warehouse';

export const LOAD_STEPS = ['upload', 'tables', 'views', 'materialize', 'validate'] as const;
export type LoadStep = (typeof LOAD_STEPS)[number];

export function parseLoadStep(value: string): LoadStep | 'all' | null {
  if (value === 'all') {
    return 'all';
  }
  return LOAD_STEPS.find(step => step === value) ?? null;
}

export interface YearLoaderDeps {
  store: MappingStore;
  sections: SourceSection[];
  targets: ViewTarget[];
  warehouse: Warehouse;
  objectStore: ObjectStore;
  blob: BlobSettings;
  global: GlobalSettings;
  reporter?: ProgressReporter;
}

export interface YearLoadOptions {
  year: string;
  dataDir: string;
  manualDir: string;
  dryRun?: boolean;
}

/**
 * Loads one EAVS year: upload CSVs, load year tables, add the year to the union
 * views, rebuild staging tables and validate. Every item is recorded in the
 * results; a failed item does not stop the run.
 */
export class EavsYearLoader {
  readonly results = new BatchResults();
  private readonly reporter: ProgressReporter;

  constructor(
    private readonly deps: YearLoaderDeps,
    private readonly options: YearLoadOptions
  ) {
    this.reporter = deps.reporter ?? new ProgressReporter();
  }

  private get year(): string {
    return this.options.year;
  }

  async run(step: LoadStep | 'all' = 'all'): Promise<BatchResults> {
    const steps: LoadStep[] = step === 'all' ? [...LOAD_STEPS] : [step];

    this.reporter.logRunStart(`EAVS ${this.year} Load`, {
      'Data dir': this.options.dataDir,
      Steps: steps.join(', '),
      'Dry run': this.options.dryRun ? 'YES' : 'no',
    });

    for (let i = 0; i < steps.length; i++) {
      this.reporter.logStep(steps[i], i + 1, steps.length);
      await this.runStep(steps[i]);
    }

    return this.results;
  }

  private async runStep(step: LoadStep): Promise<void> {
    switch (step) {
      case 'upload':
        return this.uploadFiles();
      case 'tables':
        return this.loadTables();
      case 'views':
        return this.updateViews();
      case 'materialize':
        return this.materialize();
      case 'validate':
        return this.validate();
    }
  }

  /** Local CSV of each section present in the data directory. */
  private locateFiles(step: string): Array<{ section: SourceSection; filePath: string }> {
    const found: Array<{ section: SourceSection; filePath: string }> = [];

    for (const section of this.deps.sections) {
      const resolved = resolveSourceFile(this.options.dataDir, section, this.year);
      if (!resolved) {
        this.reporter.logWarning(`File not found for section ${section.sectionCode}: ${section.sourceFile}`);
        this.results.skipped(step, section.sectionCode, 'source file not found');
        continue;
      }
      if (resolved.fallback) {
        this.reporter.logWarning(`${section.sectionCode}: expected file name not found, using ${resolved.path}`);
      }
      found.push({ section, filePath: resolved.path });
    }

    if (found.length === 0) {
      this.results.failure(step, this.options.dataDir, 'No source files found. Check the data directory structure.');
    }
    return found;
  }

  async uploadFiles(): Promise<void> {
    for (const { section, filePath } of this.locateFiles('upload')) {
      const blobPath = blobPathFor(this.year, section.sectionCode);
      this.reporter.logItem(`${path.basename(filePath)} → ${this.deps.blob.containerName}/${blobPath}`);

      if (this.options.dryRun) {
        this.reporter.logInfo('[dry-run] upload skipped');
        this.results.skipped('upload', section.sectionCode, 'dry run');
        continue;
      }

      try {
        await this.deps.objectStore.uploadFile(filePath, blobPath);
        this.reporter.logSuccess('Uploaded');
        this.results.success('upload', section.sectionCode);
      } catch (error) {
        this.reporter.logError(errorMessage(error));
        this.results.failure('upload', section.sectionCode, errorMessage(error));
      }
    }
  }

  async loadTables(): Promise<void> {
    const schema = yearSchemaName(this.year);

    for (const { section, filePath } of this.locateFiles('tables')) {
      const table = yearTableName(this.year, section.sectionCode);
      this.reporter.logItem(`[${schema}].[${table}]`);

      try {
        const columns = inferColumnDefinitions(readCsvTable(filePath));
        const rowTerminator = detectRowTerminator(filePath);
        this.reporter.logDebug(columns.map(c => `${c.name} ${c.sqlType}`).join(', '));

        if (this.options.dryRun) {
          this.reporter.logInfo(`[dry-run] would load ${columns.length} columns from ${blobPathFor(this.year, section.sectionCode)}`);
          this.results.skipped('tables', table, 'dry run');
          continue;
        }

        const rows = await this.deps.warehouse.loadCsvFromBlob({
          schema,
          table,
          columns,
          blobPath: blobPathFor(this.year, section.sectionCode),
          rowTerminator,
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

  private viewStepContext(): ViewStepContext {
    return {
      store: this.deps.store,
      targets: this.deps.targets,
      warehouse: this.deps.warehouse,
      global: this.deps.global,
      reporter: this.reporter,
      results: this.results,
      year: this.year,
      manualDir: this.options.manualDir,
      dryRun: this.options.dryRun,
    };
  }

  async updateViews(): Promise<void> {
    return runViewUpdates(this.viewStepContext());
  }

  async materialize(): Promise<void> {
    return runMaterialize(this.viewStepContext());
  }

  private recordValidation(item: string, checks: ValidationResult[]): void {
    checks.forEach(check => check.print());
    const errors = checks.flatMap(c => c.errors);
    const warnings = checks.flatMap(c => c.warnings);
    if (errors.length > 0) {
      this.results.failure('validate', item, errors[0]);
    } else if (warnings.length > 0) {
      this.results.warning('validate', item, warnings[0]);
    } else {
      this.results.success('validate', item);
    }
  }

  async validate(): Promise<void> {
    const schema = yearSchemaName(this.year);

    for (const section of this.deps.sections) {
      const table = yearTableName(this.year, section.sectionCode);

      try {
        if (!(await this.deps.warehouse.tableExists(schema, table))) {
          this.results.skipped('validate', table, 'table not loaded');
          continue;
        }
        this.recordValidation(table, [
          await checkRowCount(this.deps.warehouse, schema, table, section.expectedRows),
          await checkDuplicateFips(this.deps.warehouse, schema, table),
        ]);
      } catch (error) {
        this.reporter.logError(errorMessage(error));
        this.results.failure('validate', table, errorMessage(error));
      }
    }
  }
}
