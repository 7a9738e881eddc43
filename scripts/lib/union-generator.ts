import * as fs from 'fs';
import * as path from 'path';
import { errorMessage, MappingError } from './error-handler';
import { MappingStore } from './mapping-store';
import {
  BASE_FIELDS,
  GlobalSettings,
  isIdentifier,
  qualifiedName,
  sourceTableFor,
  ViewTarget,
} from './sections';
import { CteBlock, serializeCteUnionView, UNION_CTE_NAME } from './view-model';

/**
 * Union SQL Generator
 * ===================
 * Builds the SQL for a union view from the mapping store: one SELECT block per
 * mapped year, every block projecting the same columns in the same order.
 *
 * Two output formats:
 *   union - flat blocks joined by UNION ALL (generated/<section>_union.sql)
 *   cte   - one named block per year plus a union_all block, the format the
 *           view patcher can add a year to
 */

export type ViewFormat = 'union' | 'cte';

export type ViewContext = Pick<GlobalSettings, 'projectId' | 'analyticsDataset'>;

export interface SkippedYear {
  year: string;
  reason: string;
}

export interface GeneratedView {
  sql: string;
  /** Years that produced a block, ascending. */
  years: string[];
  skipped: SkippedYear[];
}

/**
 * Projection list for one year: the base fields, then every other standard field
 * as `<source> AS <field>` or `NULL AS <field>`.
 */
export function buildSelectList(
  store: MappingStore,
  mappingKey: string,
  year: string,
  baseFields: readonly string[] = BASE_FIELDS
): string[] {
  const problem = store.getYearProblem(mappingKey, year);
  if (problem) {
    throw new MappingError(`${mappingKey} ${year}: ${problem}`, mappingKey, year);
  }

  const mapping = store.getYearMapping(mappingKey, year);
  const columns = baseFields.map(field => (field === 'election_year' ? `'${year}' AS election_year` : field));

  for (const field of store.getStandardFields(mappingKey)) {
    if (baseFields.includes(field)) {
      continue;
    }
    const source = mapping[field];
    if (source === undefined || source === null) {
      columns.push(`NULL AS ${field}`);
    } else if (source === '') {
      throw new MappingError(`${mappingKey} ${year}: empty source expression for ${field}`, mappingKey, year);
    } else {
      columns.push(`${source} AS ${field}`);
    }
  }

  return columns;
}

/** Flat SELECT block for one year, headed by a `-- <year> Data` comment. */
export function buildYearBlock(store: MappingStore, target: ViewTarget, year: string, ctx: ViewContext): string {
  const columns = buildSelectList(store, target.mappingKey, year, target.baseFields);
  return [
    `-- ${year} Data`,
    'SELECT',
    `  ${columns.join(',\n  ')}`,
    `FROM ${sourceTableFor(ctx.projectId, target, year)}`,
  ].join('\n');
}

export function cteBlockName(target: ViewTarget, year: string): string {
  return `${target.ctePrefix}_${year}`;
}

/** Named block for one year in the CTE format. */
export function buildCteBlock(store: MappingStore, target: ViewTarget, year: string, ctx: ViewContext): CteBlock {
  const name = cteBlockName(target, year);
  if (!isIdentifier(name)) {
    throw new MappingError(`"${name}" is not a valid block name`, target.mappingKey, year);
  }
  const columns = buildSelectList(store, target.mappingKey, year, target.baseFields);
  const body = [
    '',
    '    SELECT',
    `      ${columns.join(',\n      ')}`,
    `    FROM ${sourceTableFor(ctx.projectId, target, year)}`,
    '  ',
  ].join('\n');
  return { name, body };
}

export function viewHeader(target: ViewTarget, ctx: ViewContext): string {
  return [
    `-- EAVS ${target.viewName} Union View`,
    `-- Generated from ${target.mappingKey}; regenerate with scripts/generate-union-views.ts`,
    '',
    `CREATE OR ALTER VIEW ${qualifiedName(ctx.analyticsDataset, target.viewName)} AS`,
    '',
  ].join('\n');
}

/**
 * Run `build` for every mapped year in ascending order. A year that throws is
 * logged and skipped; no usable year at all is an error.
 */
function collectBlocks<T>(
  store: MappingStore,
  target: ViewTarget,
  build: (year: string) => T
): { blocks: T[]; years: string[]; skipped: SkippedYear[] } {
  const blocks: T[] = [];
  const years: string[] = [];
  const skipped: SkippedYear[] = [];

  for (const year of store.getYears(target.mappingKey)) {
    try {
      blocks.push(build(year));
      years.push(year);
    } catch (error) {
      const reason = errorMessage(error);
      console.log(`  ⚠️  Skipping ${target.viewName} ${year}: ${reason}`);
      skipped.push({ year, reason });
    }
  }

  if (blocks.length === 0) {
    throw new MappingError(
      `No year of ${target.mappingKey} produced a SELECT block; refusing to generate an empty view`,
      target.mappingKey,
      ''
    );
  }

  return { blocks, years, skipped };
}

/**
 * Flat union view: one SELECT block per year joined by UNION ALL.
 */
export function generateUnionView(
  store: MappingStore,
  target: ViewTarget,
  ctx: ViewContext = store.getGlobal()
): GeneratedView {
  const { blocks, years, skipped } = collectBlocks(store, target, year => buildYearBlock(store, target, year, ctx));
  const sql = `${viewHeader(target, ctx)}${blocks.join('\n\nUNION ALL\n\n')}\n`;
  return { sql, years, skipped };
}

/**
 * Union view in the CTE format read and written by the view patcher.
 */
export function generateCteUnionView(
  store: MappingStore,
  target: ViewTarget,
  ctx: ViewContext = store.getGlobal()
): GeneratedView {
  const { blocks, years, skipped } = collectBlocks(store, target, year => buildCteBlock(store, target, year, ctx));
  const sql = serializeCteUnionView({
    preamble: viewHeader(target, ctx),
    blocks,
    unionArms: blocks.map(block => block.name),
    finalSelect: `\nSELECT * FROM ${UNION_CTE_NAME}\n`,
  });
  return { sql, years, skipped };
}

export interface WrittenView {
  target: ViewTarget;
  outputPath: string;
  success: boolean;
  years: string[];
  skipped: SkippedYear[];
  error?: string;
}

/**
 * Write one SQL file per view target under `outputDir`. Targets whose mapping key
 * is missing from the store, or that produce no block, are reported as failed.
 */
export function writeGeneratedViews(
  store: MappingStore,
  targets: ViewTarget[],
  outputDir: string,
  options: { format?: ViewFormat; ctx?: ViewContext } = {}
): WrittenView[] {
  const format = options.format ?? 'union';
  const ctx = options.ctx ?? store.getGlobal();
  const generate = format === 'cte' ? generateCteUnionView : generateUnionView;
  const results: WrittenView[] = [];

  fs.mkdirSync(outputDir, { recursive: true });

  for (const target of targets) {
    const outputPath = path.join(outputDir, target.outputFile);

    if (!store.hasMappingKey(target.mappingKey)) {
      results.push({
        target,
        outputPath,
        success: false,
        years: [],
        skipped: [],
        error: `No ${target.mappingKey} section in config`,
      });
      continue;
    }

    try {
      const view = generate(store, target, ctx);
      fs.writeFileSync(outputPath, view.sql, 'utf-8');
      results.push({ target, outputPath, success: true, years: view.years, skipped: view.skipped });
    } catch (error) {
      results.push({ target, outputPath, success: false, years: [], skipped: [], error: errorMessage(error) });
    }
  }

  return results;
}
