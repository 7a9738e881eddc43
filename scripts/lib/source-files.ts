import * as fs from 'fs';
import * as path from 'path';
import { SourceSection, sourceFileFor } from './sections';

export interface ResolvedSourceFile {
  path: string;
  /** True when the file name did not match and the first CSV in the directory was taken. */
  fallback: boolean;
}

function listEntries(dir: string): string[] {
  return fs.existsSync(dir) && fs.statSync(dir).isDirectory() ? fs.readdirSync(dir).sort() : [];
}

/**
 * Entries matching one path segment. A single `*` matches any run of characters.
 */
export function findMatchingEntries(entries: string[], pattern: string): string[] {
  if (pattern.includes('*')) {
    const prefix = pattern.split('*')[0];
    const suffix = pattern.split('*')[1] || '';
    return entries.filter(f => f.startsWith(prefix) && f.endsWith(suffix) && f.length >= prefix.length + suffix.length);
  }
  return entries.includes(pattern) ? [pattern] : [];
}

/**
 * Locate a section's CSV for a year under `dataDir`. Vendor directory names vary, so
 * each segment of the section's pattern may carry a wildcard; when the file itself is
 * not found the first CSV in the section directory is used.
 */
export function resolveSourceFile(dataDir: string, section: SourceSection, year: string): ResolvedSourceFile | null {
  const segments = sourceFileFor(section, year).split('/').filter(Boolean);
  let current = dataDir;

  for (let i = 0; i < segments.length; i++) {
    const entries = listEntries(current);
    const matches = findMatchingEntries(entries, segments[i]);
    const isLast = i === segments.length - 1;

    if (matches.length > 0) {
      current = path.join(current, matches[0]);
      continue;
    }

    if (isLast) {
      const csv = entries.find(entry => entry.toLowerCase().endsWith('.csv'));
      return csv ? { path: path.join(current, csv), fallback: true } : null;
    }
    return null;
  }

  return fs.existsSync(current) && fs.statSync(current).isFile() ? { path: current, fallback: false } : null;
}
