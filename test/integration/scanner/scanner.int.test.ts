import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { TreeScanner, DEFAULT_SCAN_OPTIONS } from '../../../src/scanner/TreeScanner.js';
import { FileDescriptor } from '../../../src/descriptor/FileDescriptor.js';
import { AccessError, NotFoundError } from '../../../src/errors.js';
import { ErrorCode, ErrorStage } from '../../../src/types/enums.js';
import { SymlinkPolicy } from '../../../src/types/scanPolicy.js';
import type { ScanError } from '../../../src/types/scanner.js';
import { canRevokePermissions, cleanupTempDir, createTempDir, relativeNames, writeTree } from '../../helpers.js';

describe('TreeScanner', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir('scanner-');
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  it('lists regular files depth-first in name order', async () => {
    writeTree(dir, { 'b.txt': 'b', 'a/2.txt': '2', 'a/1.txt': '1', 'c/d/e.txt': 'e' });
    fs.mkdirSync(path.join(dir, 'empty'));

    const result = await new TreeScanner().scan(dir);

    expect(result.root).toBe(dir);
    expect(relativeNames(dir, result.files)).toEqual(['a/1.txt', 'a/2.txt', 'b.txt', 'c/d/e.txt']);
    expect(result.errors).toEqual([]);
    expect(result.files[0].size).toBe(1);
  });

  it('respects ignore globs and regexes and prunes ignored directories', async () => {
    writeTree(dir, {
      'keep.txt': 'ok',
      'skip.tmp': 'no',
      'nested/skip.tmp': 'no',
      'cache/inner.txt': 'no',
      'logs/2024.log': 'no',
      'logs/readme.txt': 'ok'
    });
    const scanner = new TreeScanner({
      ...DEFAULT_SCAN_OPTIONS,
      ignore: { glob: ['*.tmp', '/cache/**'], regex: ['^/logs/\\d+\\.log$'] }
    });

    const result = await scanner.scan(dir);

    expect(relativeNames(dir, result.files)).toEqual(['keep.txt', 'logs/readme.txt']);
  });

  it('rejects a missing root or a file root with NotFoundError', async () => {
    writeTree(dir, { 'file.txt': 'x' });
    const scanner = new TreeScanner();

    await expect(scanner.scan(path.join(dir, 'missing'))).rejects.toBeInstanceOf(NotFoundError);
    await expect(scanner.scan(path.join(dir, 'file.txt'))).rejects.toMatchObject({
      name: 'NotFoundError',
      code: ErrorCode.NOT_A_DIRECTORY
    });
  });

  it('records files that vanish or deny access and keeps scanning', async () => {
    writeTree(dir, { 'a.txt': 'a', 'b.txt': 'b', 'c.txt': 'c' });
    const seen: ScanError[] = [];
    const scanner = new TreeScanner({ ...DEFAULT_SCAN_OPTIONS, onError: (error) => seen.push(error) }, async (filePath) => {
      if (filePath.endsWith('b.txt')) {
        throw new AccessError(filePath, ErrorCode.PERMISSION_DENIED, ErrorStage.STAT, 'permission revoked');
      }
      return FileDescriptor.create(filePath);
    });

    const result = await scanner.scan(dir);

    expect(relativeNames(dir, result.files)).toEqual(['a.txt', 'c.txt']);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].path).toBe(path.join(dir, 'b.txt'));
    expect(result.errors[0].cause.message).toBe('permission revoked');
    expect(seen).toEqual(result.errors);
  });

  it('does not swallow errors that are not access errors', async () => {
    writeTree(dir, { 'a.txt': 'a' });
    const scanner = new TreeScanner(DEFAULT_SCAN_OPTIONS, async () => {
      throw new Error('factory bug');
    });

    await expect(scanner.scan(dir)).rejects.toThrow('factory bug');
  });

  describe('symlinks', () => {
    const itPosix = process.platform === 'win32' ? it.skip : it;

    itPosix('skips symlinks by default', async () => {
      writeTree(dir, { 'real/a.txt': 'a' });
      fs.symlinkSync(path.join(dir, 'real'), path.join(dir, 'alias'));
      fs.symlinkSync(path.join(dir, 'real', 'a.txt'), path.join(dir, 'link.txt'));

      const result = await new TreeScanner().scan(dir);

      expect(relativeNames(dir, result.files)).toEqual(['real/a.txt']);
    });

    itPosix('follows links once per real path and survives cycles', async () => {
      const outside = createTempDir('scanner-outside-');
      try {
        writeTree(outside, { 'shared.txt': 'shared' });
        writeTree(dir, { 'sub/own.txt': 'own' });
        fs.symlinkSync(path.join(outside, 'shared.txt'), path.join(dir, 'linked.txt'));
        fs.symlinkSync(dir, path.join(dir, 'sub', 'loop'));
        fs.symlinkSync(path.join(dir, 'sub', 'own.txt'), path.join(dir, 'sub', 'z-alias.txt'));

        const result = await new TreeScanner({ ...DEFAULT_SCAN_OPTIONS, symlinkPolicy: SymlinkPolicy.FOLLOW }).scan(dir);

        expect(relativeNames(dir, result.files)).toEqual(['linked.txt', 'sub/own.txt']);
        expect(result.errors).toEqual([]);
      } finally {
        cleanupTempDir(outside);
      }
    });

    itPosix('reports a dangling link when following', async () => {
      writeTree(dir, { 'a.txt': 'a' });
      fs.symlinkSync(path.join(dir, 'gone.txt'), path.join(dir, 'dangling.txt'));

      const result = await new TreeScanner({ ...DEFAULT_SCAN_OPTIONS, symlinkPolicy: SymlinkPolicy.FOLLOW }).scan(dir);

      expect(relativeNames(dir, result.files)).toEqual(['a.txt']);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].path).toBe(path.join(dir, 'dangling.txt'));
      expect(result.errors[0].cause.code).toBe(ErrorCode.NOT_FOUND);
    });
  });

  const itUnprivileged = canRevokePermissions ? it : it.skip;

  itUnprivileged('records an unreadable directory and scans the rest', async () => {
    writeTree(dir, { 'open/a.txt': 'a', 'locked/b.txt': 'b' });
    const locked = path.join(dir, 'locked');
    fs.chmodSync(locked, 0o000);
    try {
      const result = await new TreeScanner().scan(dir);

      expect(relativeNames(dir, result.files)).toEqual(['open/a.txt']);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].path).toBe(locked);
      expect(result.errors[0].cause.code).toBe(ErrorCode.PERMISSION_DENIED);
      expect(result.errors[0].cause.stage).toBe(ErrorStage.LIST);
    } finally {
      fs.chmodSync(locked, 0o755);
    }
  });
});
