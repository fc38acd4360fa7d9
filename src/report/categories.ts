import fs from 'node:fs';
import path from 'node:path';
import type { FileDescriptor } from '../descriptor/FileDescriptor.js';

export const OTHER_CATEGORY = 'other';

export interface CategorySummary {
  category: string;
  count: number;
  bytes: number;
}

const CATEGORIES_URL = new URL('../../data/categories.json', import.meta.url);

let extensionIndex: Map<string, string> | undefined;

function isCategoryTable(value: unknown): value is Record<string, string[]> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    (extensions) => Array.isArray(extensions) && extensions.every((ext) => typeof ext === 'string')
  );
}

function loadExtensionIndex(): Map<string, string> {
  if (extensionIndex) return extensionIndex;
  const parsed: unknown = JSON.parse(fs.readFileSync(CATEGORIES_URL, 'utf8'));
  if (!isCategoryTable(parsed)) {
    throw new Error(`Malformed category table: ${CATEGORIES_URL.pathname}`);
  }
  const index = new Map<string, string>();
  for (const [category, extensions] of Object.entries(parsed)) {
    for (const ext of extensions) index.set(ext.toLowerCase(), category);
  }
  extensionIndex = index;
  return index;
}

export function categoryOf(fileName: string): string {
  const ext = path.extname(fileName).slice(1).toLowerCase();
  if (!ext) return OTHER_CATEGORY;
  return loadExtensionIndex().get(ext) ?? OTHER_CATEGORY;
}

/** Totals per category, largest first; equal totals are ordered by name. */
export function summarizeByCategory(files: Iterable<FileDescriptor>): CategorySummary[] {
  const totals = new Map<string, CategorySummary>();
  for (const file of files) {
    const category = categoryOf(file.name);
    const entry = totals.get(category) ?? { category, count: 0, bytes: 0 };
    entry.count += 1;
    entry.bytes += file.size;
    totals.set(category, entry);
  }
  return [...totals.values()].sort((a, b) => {
    if (a.bytes !== b.bytes) return b.bytes - a.bytes;
    if (a.category === b.category) return 0;
    return a.category < b.category ? -1 : 1;
  });
}
