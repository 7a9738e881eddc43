import * as fs from 'fs';
import { ConfigError } from './error-handler';
import {
  DEFAULT_GLOBAL,
  GlobalSettings,
  isIdentifier,
  isYear,
  parseGlobalSettings,
  parseViewTargets,
  ViewTarget,
} from './sections';

/**
 * Mapping Store
 * =============
 * Read-only access to the `<section>_mappings` blocks of the config document:
 *
 *   "registration_mappings": {
 *     "standard_fields": ["fips", "election_year", "state", "county", "total_reg"],
 *     "2016": { "total_reg": "A1a" },
 *     "2018": { "total_reg": "null" }
 *   }
 *
 * Year keys are normalized to four-digit strings once, at load time. A source value of
 * `null` or "null" means the field does not exist that year.
 */

export const NULL_SENTINEL = 'null';

/** A source column/expression, or null when the field has no source that year. */
export type SourceExpression = string | null;
export type YearMapping = Record<string, SourceExpression>;

export interface SectionMappings {
  standardFields: string[];
  years: Map<string, YearMapping>;
  /** Years whose mapping could not be read, with the reason. */
  problems: Map<string, string>;
}

const MAPPING_KEY_SUFFIX = '_mappings';
const STANDARD_FIELDS_KEY = 'standard_fields';

/**
 * Canonical form of a year key: the backing document may hold years as numbers or strings.
 * Returns null for anything that is not a four-digit year.
 */
export function normalizeYearKey(key: string | number): string | null {
  const text = typeof key === 'number' ? (Number.isInteger(key) ? String(key) : '') : key.trim();
  return isYear(text) ? text : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseStandardFields(mappingKey: string, raw: unknown): string[] {
  if (raw === undefined) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw new ConfigError(`${mappingKey}.standard_fields must be a list`);
  }

  const fields: string[] = [];
  for (const entry of raw) {
    if (typeof entry !== 'string' || !isIdentifier(entry)) {
      throw new ConfigError(`${mappingKey}.standard_fields: "${String(entry)}" is not a valid column name`);
    }
    if (fields.includes(entry)) {
      throw new ConfigError(`${mappingKey}.standard_fields lists "${entry}" twice`);
    }
    fields.push(entry);
  }
  return fields;
}

function parseYearMapping(raw: unknown): { mapping: YearMapping; problem?: string } {
  if (!isRecord(raw)) {
    return { mapping: {}, problem: 'year mapping is not an object' };
  }

  const mapping: YearMapping = {};
  const badFields: string[] = [];

  for (const [field, value] of Object.entries(raw)) {
    if (value === null) {
      mapping[field] = null;
    } else if (typeof value === 'string') {
      const trimmed = value.trim();
      mapping[field] = trimmed.toLowerCase() === NULL_SENTINEL ? null : trimmed;
    } else {
      badFields.push(field);
    }
  }

  if (badFields.length > 0) {
    return { mapping, problem: `non-string source value for ${badFields.join(', ')}` };
  }
  return { mapping };
}

export function parseSectionMappings(mappingKey: string, raw: unknown): SectionMappings {
  if (!isRecord(raw)) {
    throw new ConfigError(`${mappingKey} must be an object`);
  }

  const section: SectionMappings = {
    standardFields: parseStandardFields(mappingKey, raw[STANDARD_FIELDS_KEY]),
    years: new Map(),
    problems: new Map(),
  };

  for (const [key, value] of Object.entries(raw)) {
    if (key === STANDARD_FIELDS_KEY) {
      continue;
    }
    const year = normalizeYearKey(key);
    if (!year) {
      throw new ConfigError(`${mappingKey}: "${key}" is neither standard_fields nor a four-digit year`);
    }
    if (section.years.has(year)) {
      throw new ConfigError(`${mappingKey}: year ${year} is defined twice`);
    }

    const { mapping, problem } = parseYearMapping(value);
    section.years.set(year, mapping);
    if (problem) {
      section.problems.set(year, problem);
    }
  }

  return section;
}

export class MappingStore {
  private constructor(
    private readonly sections: Map<string, SectionMappings>,
    private readonly global: GlobalSettings,
    private readonly viewTargets: ViewTarget[]
  ) {}

  /**
   * Build a store from a parsed config document. Every top-level `*_mappings` key is a section.
   */
  static fromDocument(document: Record<string, unknown>): MappingStore {
    const sections = new Map<string, SectionMappings>();
    for (const [key, value] of Object.entries(document)) {
      if (key.endsWith(MAPPING_KEY_SUFFIX)) {
        sections.set(key, parseSectionMappings(key, value));
      }
    }
    const fileGlobal = parseGlobalSettings(document);
    const global: GlobalSettings = {
      projectId: fileGlobal.projectId ?? DEFAULT_GLOBAL.projectId,
      analyticsDataset: fileGlobal.analyticsDataset ?? DEFAULT_GLOBAL.analyticsDataset,
      bucket: fileGlobal.bucket ?? DEFAULT_GLOBAL.bucket,
    };
    return new MappingStore(sections, global, parseViewTargets(document));
  }

  static fromFile(filePath: string): MappingStore {
    return MappingStore.fromDocument(readConfigDocument(filePath));
  }

  /** The document's `global` section, with defaults for absent keys. */
  getGlobal(): GlobalSettings {
    return { ...this.global };
  }

  getViewTargets(): ViewTarget[] {
    return this.viewTargets.map(target => ({ ...target }));
  }

  getMappingKeys(): string[] {
    return [...this.sections.keys()].sort();
  }

  hasMappingKey(mappingKey: string): boolean {
    return this.sections.has(mappingKey);
  }

  /** Years present for the section, ascending. */
  getYears(mappingKey: string): string[] {
    const section = this.sections.get(mappingKey);
    return section ? [...section.years.keys()].sort() : [];
  }

  getStandardFields(mappingKey: string): string[] {
    const section = this.sections.get(mappingKey);
    return section ? [...section.standardFields] : [];
  }

  /**
   * Mapping of standard field to source expression (or null) for one year.
   * Unknown sections and years yield an empty mapping.
   */
  getYearMapping(mappingKey: string, year: string | number): YearMapping {
    const key = normalizeYearKey(year);
    const mapping = key ? this.sections.get(mappingKey)?.years.get(key) : undefined;
    return mapping ? { ...mapping } : {};
  }

  hasYear(mappingKey: string, year: string | number): boolean {
    const key = normalizeYearKey(year);
    return key !== null && (this.sections.get(mappingKey)?.years.has(key) ?? false);
  }

  /** Why a year's mapping is unusable, if it is. */
  getYearProblem(mappingKey: string, year: string | number): string | undefined {
    const key = normalizeYearKey(year);
    return key ? this.sections.get(mappingKey)?.problems.get(key) : undefined;
  }
}

/**
 * Read and parse the JSON config document.
 */
export function readConfigDocument(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`${filePath} must contain a JSON object`);
  }
  return parsed;
}
