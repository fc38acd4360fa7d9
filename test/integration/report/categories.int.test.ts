import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { categoryOf, OTHER_CATEGORY, summarizeByCategory } from '../../../src/report/categories.js';
import { cleanupTempDir, createTempDir, describeAll, writeTree } from '../../helpers.js';

describe('categoryOf', () => {
  it('maps extensions case-insensitively', () => {
    expect(categoryOf('holiday.JPG')).toBe('image');
    expect(categoryOf('notes.md')).toBe('document');
    expect(categoryOf('backup.tar')).toBe('archive');
  });

  it('falls back for unknown or missing extensions', () => {
    expect(categoryOf('data.qqq')).toBe(OTHER_CATEGORY);
    expect(categoryOf('Makefile')).toBe(OTHER_CATEGORY);
    expect(categoryOf('.bashrc')).toBe(OTHER_CATEGORY);
  });
});

describe('summarizeByCategory', () => {
  let root: string;

  beforeEach(() => {
    root = createTempDir('categories-');
    writeTree(root, {
      'a.png': Buffer.alloc(300),
      'b.jpg': Buffer.alloc(200),
      'c.mp3': Buffer.alloc(500),
      'd.txt': Buffer.alloc(100),
      'e.bin2': Buffer.alloc(100)
    });
  });

  afterEach(() => {
    cleanupTempDir(root);
  });

  it('totals per category, largest first then by name', async () => {
    const files = await describeAll(root, ['a.png', 'b.jpg', 'c.mp3', 'd.txt', 'e.bin2']);
    expect(summarizeByCategory(files)).toEqual([
      { category: 'audio', count: 1, bytes: 500 },
      { category: 'image', count: 2, bytes: 500 },
      { category: 'document', count: 1, bytes: 100 },
      { category: 'other', count: 1, bytes: 100 }
    ]);
  });

  it('returns nothing for no files', () => {
    expect(summarizeByCategory([])).toEqual([]);
  });
});
