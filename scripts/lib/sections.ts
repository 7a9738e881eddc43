import { ConfigError } from './error-handler';

/**
 * EAVS survey sections, warehouse object naming and union view targets
 *
 * Naming convention:
 *   schema  eavs_<year>
 *   table   eavs_county_<yy>_<section_code>
 *   blob    <year>/<section_code>.csv
 */

export interface GlobalSettings {
  /** Warehouse database that holds the eavs_<year> schemas. */
  projectId: string;
  /** Schema holding the union views and staging tables. */
  analyticsDataset: string;
  /** Blob container for uploaded source files. */
  bucket: string;
}

export const DEFAULT_GLOBAL: GlobalSettings = {
  projectId: 'eavs',
  analyticsDataset: 'eavs_analytics',
  bucket: 'eavs-data-files',
};

export interface SourceSection {
  sectionCode: string;
  /** Path below the year's data directory. `{yy}`/`{year}` are substituted, `*` matches within one segment. */
  sourceFile: string;
  expectedRows: [number, number];
}

export interface ViewTarget {
  mappingKey: string;
  sectionCode: string;
  viewName: string;
  outputFile: string;
  stagingTable: string;
  /** Name prefix of the per-year CTE blocks, `<prefix>_<year>`. */
  ctePrefix: string;
  /** Columns every block starts with. Defaults to BASE_FIELDS. */
  baseFields?: readonly string[];
  /**
   * Per-year source table as `<schema>.<table>`, with `{year}`/`{yy}` substituted.
   * Defaults to the section's `eavs_<year>` table.
   */
  sourceTable?: string;
}

/** Columns every year block starts with, whether or not `standard_fields` lists them. */
export const BASE_FIELDS = ['fips', 'election_year', 'state', 'county', 'state_abbr', 'county_name'] as const;

/** Denominator views carry no county keys of their own beyond what their mappings project. */
export const DENOMINATOR_BASE_FIELDS: readonly string[] = ['election_year'];

const COUNTY_ROW_RANGE: [number, number] = [3000, 3300];

export const DEFAULT_SOURCE_SECTIONS: SourceSection[] = [
  { sectionCode: 'a_reg', sourceFile: 'Section A_ Registration/EAVS_county_{yy}_A_REG.csv', expectedRows: COUNTY_ROW_RANGE },
  { sectionCode: 'b_uocava', sourceFile: 'Section B_ UOCAVA/EAVS_county_{yy}_B_UOCAVA.csv', expectedRows: COUNTY_ROW_RANGE },
  { sectionCode: 'c_mail', sourceFile: 'Section C_ Mail/EAVS_county_{yy}_C_MAIL.csv', expectedRows: COUNTY_ROW_RANGE },
  { sectionCode: 'd_polls', sourceFile: 'Section D_ Polling Places/EAVS_county_{yy}_D_POLLS.csv', expectedRows: COUNTY_ROW_RANGE },
  { sectionCode: 'e_provisional', sourceFile: 'Section E_ Provisional/EAVS_county_{yy}_E_PROVISIONAL.csv', expectedRows: COUNTY_ROW_RANGE },
  { sectionCode: 'f1_participation', sourceFile: 'Section F1_ Participation*/EAVS_county_{yy}_F1_PARTICIPATION.csv', expectedRows: COUNTY_ROW_RANGE },
  { sectionCode: 'f2_tech', sourceFile: 'Section F2_ Voting Technology/EAVS_county_{yy}_F2_TECH.csv', expectedRows: COUNTY_ROW_RANGE },
];

export const DEFAULT_VIEW_TARGETS: ViewTarget[] = [
  {
    mappingKey: 'registration_mappings',
    sectionCode: 'a_reg',
    viewName: 'eavs_county_reg_union',
    outputFile: 'registration_union.sql',
    stagingTable: 'stg_eavs_county_reg_union',
    ctePrefix: 'a_reg',
  },
  {
    mappingKey: 'mail_mappings',
    sectionCode: 'c_mail',
    viewName: 'eavs_county_mail_union',
    outputFile: 'mail_union.sql',
    stagingTable: 'stg_eavs_county_mail_union',
    ctePrefix: 'c_mail',
  },
  {
    mappingKey: 'uocava_mappings',
    sectionCode: 'b_uocava',
    viewName: 'eavs_county_uocava_union',
    outputFile: 'uocava_union.sql',
    stagingTable: 'stg_eavs_county_uocava_union',
    ctePrefix: 'b_uocava',
  },
  {
    mappingKey: 'participation_mappings',
    sectionCode: 'f1_participation',
    viewName: 'eavs_county_part_union',
    outputFile: 'participation_union.sql',
    stagingTable: 'stg_eavs_county_part_union',
    ctePrefix: 'f1_participation',
  },
];

/** Population denominators joined against the EAVS views: VEP by state, ACS CVAP by county. */
export const DEFAULT_DENOMINATOR_TARGETS: ViewTarget[] = [
  {
    mappingKey: 'vep_mappings',
    sectionCode: 'vep',
    viewName: 'vep_union',
    outputFile: 'vep_union.sql',
    stagingTable: 'stg_vep_union',
    ctePrefix: 'vep',
    baseFields: DENOMINATOR_BASE_FIELDS,
    sourceTable: 'us_elections_vep.vep_{year}',
  },
  {
    mappingKey: 'acs_population_mappings',
    sectionCode: 'acs',
    viewName: 'acs_population_union',
    outputFile: 'acs_population_union.sql',
    stagingTable: 'stg_acs_population_union',
    ctePrefix: 'acs',
    baseFields: DENOMINATOR_BASE_FIELDS,
    sourceTable: 'acs.acs_county_cvap_{year}',
  },
];

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

export function isYear(value: string): boolean {
  return /^\d{4}$/.test(value);
}

export function shortYear(year: string): string {
  return year.slice(-2);
}

export function yearSchemaName(year: string): string {
  return `eavs_${year}`;
}

export function yearTableName(year: string, sectionCode: string): string {
  return `eavs_county_${shortYear(year)}_${sectionCode}`;
}

export function blobPathFor(year: string, sectionCode: string): string {
  return `${year}/${sectionCode}.csv`;
}

/** Quote an identifier for SQL Server. */
export function bracket(identifier: string): string {
  return `[${identifier.replace(/]/g, ']]')}]`;
}

export function qualifiedName(schema: string, name: string): string {
  return `${bracket(schema)}.${bracket(name)}`;
}

function substituteYear(pattern: string, year: string): string {
  return pattern.replace(/\{yy\}/g, shortYear(year)).replace(/\{year\}/g, year);
}

/** Schema and table a target reads for one year. */
export function resolveSourceTable(target: ViewTarget, year: string): { schema: string; table: string } {
  if (!target.sourceTable) {
    return { schema: yearSchemaName(year), table: yearTableName(year, target.sectionCode) };
  }
  const [schema, table] = substituteYear(target.sourceTable, year).split('.');
  return { schema, table };
}

export function sourceTableFor(projectId: string, target: ViewTarget, year: string): string {
  const { schema, table } = resolveSourceTable(target, year);
  return [projectId, schema, table].map(bracket).join('.');
}

export function sourceFileFor(section: SourceSection, year: string): string {
  return substituteYear(section.sourceFile, year);
}

// =============================================================================
// Config document parsing
// =============================================================================

function readString(entry: Record<string, unknown>, key: string, context: string): string {
  const value = entry[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`${context}: "${key}" must be a non-empty string`);
  }
  return value.trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRange(value: unknown, context: string): [number, number] {
  if (value === undefined) {
    return COUNTY_ROW_RANGE;
  }
  if (
    !Array.isArray(value) ||
    value.length !== 2 ||
    typeof value[0] !== 'number' ||
    typeof value[1] !== 'number' ||
    value[0] > value[1]
  ) {
    throw new ConfigError(`${context}: "expected_rows" must be [min, max]`);
  }
  return [value[0], value[1]];
}

/**
 * Read the document's `global` section. Keys that are absent or blank are left undefined.
 */
export function parseGlobalSettings(document: Record<string, unknown>): Partial<GlobalSettings> {
  const raw = document['global'];
  if (raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError('"global" must be an object');
  }
  const pick = (key: string): string | undefined => {
    const value = raw[key];
    return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
  };
  return {
    projectId: pick('project_id'),
    analyticsDataset: pick('analytics_dataset'),
    bucket: pick('bucket') ?? pick('gcs_bucket'),
  };
}

/**
 * Read the `sections` list of the config document, or the built-in EAVS sections when absent.
 */
export function parseSourceSections(document: Record<string, unknown>): SourceSection[] {
  const raw = document['sections'];
  if (raw === undefined) {
    return DEFAULT_SOURCE_SECTIONS;
  }
  if (!Array.isArray(raw)) {
    throw new ConfigError('"sections" must be a list');
  }

  return raw.map((entry: unknown, index) => {
    const context = `sections[${index}]`;
    if (!isRecord(entry)) {
      throw new ConfigError(`${context} must be an object`);
    }
    const sectionCode = readString(entry, 'section_code', context);
    if (!isIdentifier(sectionCode)) {
      throw new ConfigError(`${context}: section_code "${sectionCode}" is not a valid identifier`);
    }
    return {
      sectionCode,
      sourceFile: readString(entry, 'source_file', context),
      expectedRows: readRange(entry['expected_rows'], context),
    };
  });
}

function readStringList(value: unknown, key: string, context: string): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || value.length === 0 || !value.every(v => typeof v === 'string' && isIdentifier(v))) {
    throw new ConfigError(`${context}: "${key}" must be a non-empty list of column names`);
  }
  return value.map(String);
}

function parseViewTarget(entry: unknown, context: string): ViewTarget {
  if (!isRecord(entry)) {
    throw new ConfigError(`${context} must be an object`);
  }
  const sectionCode = readString(entry, 'section_code', context);
  const viewName = readString(entry, 'view_name', context);
  const ctePrefix = typeof entry['cte_prefix'] === 'string' ? entry['cte_prefix'] : sectionCode;

  for (const [label, name] of [['section_code', sectionCode], ['view_name', viewName], ['cte_prefix', ctePrefix]]) {
    if (!isIdentifier(name)) {
      throw new ConfigError(`${context}: ${label} "${name}" is not a valid identifier`);
    }
  }

  const target: ViewTarget = {
    mappingKey: readString(entry, 'mapping_key', context),
    sectionCode,
    viewName,
    outputFile: typeof entry['output_file'] === 'string' ? entry['output_file'] : `${viewName}.sql`,
    stagingTable: typeof entry['staging_table'] === 'string' ? entry['staging_table'] : `stg_${viewName}`,
    ctePrefix,
  };

  const baseFields = readStringList(entry['base_fields'], 'base_fields', context);
  if (baseFields) {
    target.baseFields = baseFields;
  }
  if (entry['source_table'] !== undefined) {
    const sourceTable = readString(entry, 'source_table', context);
    if (sourceTable.split('.').length !== 2) {
      throw new ConfigError(`${context}: source_table "${sourceTable}" must be <schema>.<table>`);
    }
    target.sourceTable = sourceTable;
  }
  return target;
}

function parseTargetList(document: Record<string, unknown>, key: string, defaults: ViewTarget[]): ViewTarget[] {
  const raw = document[key];
  if (raw === undefined) {
    return defaults;
  }
  if (!Array.isArray(raw)) {
    throw new ConfigError(`"${key}" must be a list`);
  }
  return raw.map((entry: unknown, index) => parseViewTarget(entry, `${key}[${index}]`));
}

/**
 * Read the `views` list of the config document, or the built-in union views when absent.
 */
export function parseViewTargets(document: Record<string, unknown>): ViewTarget[] {
  return parseTargetList(document, 'views', DEFAULT_VIEW_TARGETS);
}

/**
 * Read the `denominator_views` list, or the built-in VEP and ACS population views when absent.
 * An entry without `base_fields` starts its blocks with `election_year` only.
 */
export function parseDenominatorTargets(document: Record<string, unknown>): ViewTarget[] {
  return parseTargetList(document, 'denominator_views', DEFAULT_DENOMINATOR_TARGETS).map(target => ({
    ...target,
    baseFields: target.baseFields ?? DENOMINATOR_BASE_FIELDS,
  }));
}

/** Find a view target by section code, mapping key or view name. */
export function findViewTarget(targets: ViewTarget[], key: string): ViewTarget | undefined {
  return targets.find(t => t.sectionCode === key || t.mappingKey === key || t.viewName === key);
}
