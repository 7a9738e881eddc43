import { errorMessage, UnsupportedViewSqlError } from './error-handler';
import { MappingStore, normalizeYearKey } from './mapping-store';
import { ViewTarget } from './sections';
import { buildCteBlock, cteBlockName, ViewContext } from './union-generator';
import { CteBlock, CteUnionView, parseCteUnionView, serializeCteUnionView } from './view-model';

/**
 * Incremental View Patcher
 * ========================
 * Adds one year to an existing CTE union view without regenerating the other years.
 * The view text is parsed into a CteUnionView, the new block and union arm are added
 * to the model, and the model is serialized back. Text outside the CTE format is
 * rejected, never patched by guesswork.
 */

export type PatchResult =
  | { status: 'already_present'; sql: string }
  | { status: 'patched'; sql: string }
  | { status: 'failed'; reason: string; sql: string; unparseable: boolean };

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/** Year of a block named `<prefix>_<year>`, or null for any other block. */
function blockYear(name: string, prefix: string): string | null {
  const match = /^(.+)_(\d{4})$/.exec(name);
  return match && sameName(match[1], prefix) ? match[2] : null;
}

/** Arms selecting a block that does not exist. */
function danglingArms(view: CteUnionView): string[] {
  return view.unionArms.filter(arm => !view.blocks.some(block => sameName(block.name, arm)));
}

/**
 * Position for a new block of `year`: after the highest earlier year of the same
 * section, or at the end of the block list when there is none.
 */
function insertionIndex(view: CteUnionView, prefix: string, year: string): number {
  let bestIndex = -1;
  let bestYear = '';

  view.blocks.forEach((block, index) => {
    const existing = blockYear(block.name, prefix);
    if (existing !== null && existing < year && existing > bestYear) {
      bestYear = existing;
      bestIndex = index;
    }
  });

  return bestIndex === -1 ? view.blocks.length : bestIndex + 1;
}

/**
 * Add `year` to a CTE union view.
 *
 * - already_present: both the `<prefix>_<year>` block and its union arm exist; `sql` is the input.
 * - patched: `sql` holds the view with the new block and arm.
 * - failed: `sql` is the input unchanged; `unparseable` is set when the text is not a CTE union view.
 */
export function patchUnionView(
  existingSql: string,
  store: MappingStore,
  target: ViewTarget,
  year: string | number,
  ctx: ViewContext = store.getGlobal()
): PatchResult {
  const fail = (reason: string, unparseable = false): PatchResult => ({
    status: 'failed',
    reason,
    sql: existingSql,
    unparseable,
  });

  const yearKey = normalizeYearKey(year);
  if (!yearKey) {
    return fail(`"${String(year)}" is not a four-digit year`);
  }

  let view: CteUnionView;
  try {
    view = parseCteUnionView(existingSql);
  } catch (error) {
    if (error instanceof UnsupportedViewSqlError) {
      return fail(`Unsupported view format: ${error.message}`, true);
    }
    throw error;
  }

  const dangling = danglingArms(view);
  if (dangling.length > 0) {
    return fail(`Inconsistent view: union_all selects undefined block(s) ${dangling.join(', ')}`);
  }

  const name = cteBlockName(target, yearKey);
  const hasBlock = view.blocks.some(block => sameName(block.name, name));
  const hasArm = view.unionArms.some(arm => sameName(arm, name));

  if (hasBlock && hasArm) {
    return { status: 'already_present', sql: existingSql };
  }
  if (hasBlock) {
    return fail(`Inconsistent view: block ${name} exists but union_all does not select it`);
  }

  if (!store.hasYear(target.mappingKey, yearKey)) {
    return fail(`No ${target.mappingKey} mapping for ${yearKey}`);
  }

  let block: CteBlock;
  try {
    block = buildCteBlock(store, target, yearKey, ctx);
  } catch (error) {
    return fail(errorMessage(error));
  }

  const blocks = [...view.blocks];
  blocks.splice(insertionIndex(view, target.ctePrefix, yearKey), 0, block);

  return {
    status: 'patched',
    sql: serializeCteUnionView({ ...view, blocks, unionArms: [...view.unionArms, name] }),
  };
}
