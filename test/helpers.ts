import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FileDescriptor } from '../src/descriptor/FileDescriptor.js';

// --- Filesystem helpers ----------------------------------------------------

// Each test builds its own temp tree so files can run in parallel.
export function createTempDir(prefix = 'filetwins-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export type TreeSpec = Record<string, string | Buffer>;

// Writes `relative path -> content` entries under root, creating parents.
export function writeTree(root: string, tree: TreeSpec): void {
  for (const [relative, content] of Object.entries(tree)) {
    const target = path.join(root, relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
}

export function setMtime(filePath: string, iso: string): void {
  const when = new Date(iso);
  fs.utimesSync(filePath, when, when);
}

// --- Descriptor helpers ----------------------------------------------------

export async function describeAll(root: string, relatives: string[]): Promise<FileDescriptor[]> {
  const files: FileDescriptor[] = [];
  for (const relative of relatives) {
    files.push(await FileDescriptor.create(path.join(root, relative)));
  }
  return files;
}

export function relativeNames(root: string, files: readonly FileDescriptor[]): string[] {
  return files.map((file) => path.relative(root, file.path).split(path.sep).join('/'));
}

// POSIX permission tricks do nothing for root or on Windows.
export const canRevokePermissions = process.platform !== 'win32' && process.getuid?.() !== 0;
