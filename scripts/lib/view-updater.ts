import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from './error-handler';
import { MappingStore } from './mapping-store';
import { ViewTarget } from './sections';
import { generateCteUnionView, ViewContext } from './union-generator';
import { patchUnionView } from './view-patcher';
import { Warehouse } from './warehouse';

export type ViewUpdateStatus = 'created' | 'patched' | 'already_present' | 'preview' | 'failed';

export interface ViewUpdateResult {
  viewName: string;
  status: ViewUpdateStatus;
  reason?: string;
  /** File written for review (preview, current definition or manual patch). */
  savedTo?: string;
}

export interface ViewUpdateOptions {
  manualDir: string;
  dryRun?: boolean;
  ctx?: ViewContext;
}

const CREATE_VIEW = /\bCREATE\s+(?:OR\s+ALTER\s+)?VIEW\b/i;

/**
 * Rewrite the statement's CREATE [OR ALTER] VIEW to CREATE OR ALTER VIEW, so
 * pushing a stored definition back is a full replace.
 */
export function toCreateOrAlter(definition: string): string {
  return definition.replace(CREATE_VIEW, 'CREATE OR ALTER VIEW');
}

export function saveSqlForReview(dir: string, fileName: string, sqlText: string): string {
  fs.mkdirSync(dir, { recursive: true });
  const filePath = path.join(dir, fileName);
  fs.writeFileSync(filePath, sqlText, 'utf-8');
  return filePath;
}

/**
 * Add `year` to a union view in the warehouse.
 *
 * A missing view is created from the mappings in the CTE format. An existing view is
 * patched and pushed back as a whole. When it cannot be patched, its current definition
 * is saved to `<view>_current.sql` (unsupported format) or `<view>_MANUAL.sql` and the
 * view is reported as failed; nothing is pushed. Dry runs save `<view>_preview.sql` instead.
 */
export async function updateUnionView(
  warehouse: Warehouse,
  store: MappingStore,
  target: ViewTarget,
  year: string,
  options: ViewUpdateOptions
): Promise<ViewUpdateResult> {
  const ctx = options.ctx ?? store.getGlobal();
  const viewName = target.viewName;

  const push = async (sqlText: string, status: 'created' | 'patched'): Promise<ViewUpdateResult> => {
    if (options.dryRun) {
      return {
        viewName,
        status: 'preview',
        savedTo: saveSqlForReview(options.manualDir, `${viewName}_preview.sql`, sqlText),
      };
    }
    try {
      await warehouse.replaceView(sqlText);
      return { viewName, status };
    } catch (error) {
      return {
        viewName,
        status: 'failed',
        reason: `Replacing view failed: ${errorMessage(error)}`,
        savedTo: saveSqlForReview(options.manualDir, `${viewName}_MANUAL.sql`, sqlText),
      };
    }
  };

  const existing = await warehouse.getViewDefinition(ctx.analyticsDataset, viewName);

  if (existing === null) {
    let created: string;
    try {
      created = generateCteUnionView(store, target, ctx).sql;
    } catch (error) {
      return { viewName, status: 'failed', reason: errorMessage(error) };
    }
    return push(created, 'created');
  }

  const patch = patchUnionView(existing, store, target, year, ctx);

  switch (patch.status) {
    case 'already_present':
      return { viewName, status: 'already_present' };
    case 'patched':
      return push(toCreateOrAlter(patch.sql), 'patched');
    case 'failed':
      return {
        viewName,
        status: 'failed',
        reason: patch.reason,
        savedTo: saveSqlForReview(
          options.manualDir,
          patch.unparseable ? `${viewName}_current.sql` : `${viewName}_MANUAL.sql`,
          patch.sql
        ),
      };
  }
}
