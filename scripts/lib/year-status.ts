import { errorMessage } from './error-handler';
import { ProgressReporter } from './progress-reporter';
import { BatchResults } from './results';
import { SourceSection, ViewTarget, yearSchemaName, yearTableName } from './sections';
import { countViewRowsForYear } from './validation-checks';
import { Warehouse } from './warehouse';

export interface YearStatusOptions {
  year: string;
  sections: SourceSection[];
  targets: ViewTarget[];
  analyticsSchema: string;
}

/**
 * Whether a year is loaded: its schema, one table per section, and its rows in each
 * union view. A missing table or view year is a warning; a query error fails that item only.
 */
export async function checkYearStatus(
  warehouse: Warehouse,
  options: YearStatusOptions,
  reporter: ProgressReporter = new ProgressReporter()
): Promise<BatchResults> {
  const results = new BatchResults();
  const { year } = options;
  const schema = yearSchemaName(year);

  try {
    if (!(await warehouse.schemaExists(schema))) {
      reporter.logError(`Schema ${schema} not found`);
      results.failure('schema', schema, 'not found');
      return results;
    }
  } catch (error) {
    reporter.logError(errorMessage(error));
    results.failure('schema', schema, errorMessage(error));
    return results;
  }
  reporter.logSuccess(`Schema ${schema} exists`);
  results.success('schema', schema);

  reporter.logItem('Checking tables:');
  for (const section of options.sections) {
    const table = yearTableName(year, section.sectionCode);
    try {
      if (await warehouse.tableExists(schema, table)) {
        const rows = await warehouse.countRows(schema, table);
        reporter.logSuccess(`${table}: ${rows.toLocaleString('en-US')} rows`);
        results.success('tables', table, rows);
      } else {
        reporter.logWarning(`${table}: not found`);
        results.warning('tables', table, 'not found');
      }
    } catch (error) {
      reporter.logError(`${table}: ${errorMessage(error)}`);
      results.failure('tables', table, errorMessage(error));
    }
  }

  reporter.logItem('Checking union views:');
  for (const target of options.targets) {
    try {
      const rows = await countViewRowsForYear(warehouse, options.analyticsSchema, target.viewName, year);
      if (rows > 0) {
        reporter.logSuccess(`${target.viewName}: ${rows.toLocaleString('en-US')} rows for ${year}`);
        results.success('views', target.viewName, rows);
      } else {
        reporter.logWarning(`${target.viewName}: no data for ${year} (view needs updating)`);
        results.warning('views', target.viewName, `no data for ${year}`);
      }
    } catch (error) {
      reporter.logWarning(`${target.viewName}: error querying (${errorMessage(error)})`);
      results.warning('views', target.viewName, errorMessage(error));
    }
  }

  return results;
}
