import fs from 'node:fs';
import path from 'node:path';
import { FileDescriptor } from '../descriptor/FileDescriptor.js';
import { AccessError, NotFoundError } from '../errors.js';
import { componentLogger } from '../logger.js';
import { ErrorCode, ErrorStage } from '../types/enums.js';
import { SymlinkPolicy } from '../types/scanPolicy.js';
import type { DescriptorFactory, ScanError, ScanOptions, ScanResult } from '../types/scanner.js';
import { IgnoreMatcher } from './ignore/IgnoreMatcher.js';
import { regexEngine } from './ignore/compileRegex.js';
import { mapFsError } from './errorMapper.js';

export const DEFAULT_SCAN_OPTIONS: ScanOptions = {
  ignore: { glob: [], regex: [] },
  symlinkPolicy: SymlinkPolicy.DONT_FOLLOW
};

function byName(a: fs.Dirent, b: fs.Dirent): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

function appendRelative(parent: string, name: string): string {
  return parent === '/' ? `/${name}` : `${parent}/${name}`;
}

/**
 * Walks a directory tree depth-first and produces a descriptor for every
 * regular file. Per-entry failures are collected and the walk continues;
 * only an unusable root aborts the scan.
 */
export class TreeScanner {
  private readonly log = componentLogger('scanner');

  constructor(
    private readonly options: ScanOptions = DEFAULT_SCAN_OPTIONS,
    private readonly createDescriptor: DescriptorFactory = (filePath) => FileDescriptor.create(filePath)
  ) {}

  async scan(rootPath: string): Promise<ScanResult> {
    const root = path.resolve(rootPath);
    await this.assertDirectory(root);

    const ignore = new IgnoreMatcher(this.options.ignore);
    if (this.options.ignore.regex.length > 0) {
      this.log.debug(`ignore regexes compiled with ${regexEngine()}`);
    }
    const visited = new Set<string>([await fs.promises.realpath(root)]);
    const files: FileDescriptor[] = [];
    const errors: ScanError[] = [];

    const recordError = (cause: AccessError) => {
      const error: ScanError = { path: cause.path, cause };
      errors.push(error);
      this.log.warn(`skipped ${cause.path}: ${cause.code} (${cause.message})`);
      this.options.onError?.(error);
    };

    const addFile = async (filePath: string) => {
      try {
        files.push(await this.createDescriptor(filePath));
      } catch (err) {
        if (!(err instanceof AccessError)) throw err;
        recordError(err);
      }
    };

    // Under FOLLOW a file or directory can be reachable through several
    // paths; only the first path reached is kept.
    const following = this.options.symlinkPolicy === SymlinkPolicy.FOLLOW;
    const claim = async (entryPath: string): Promise<boolean> => {
      let real: string;
      try {
        real = await fs.promises.realpath(entryPath);
      } catch (err) {
        recordError(mapFsError(err, ErrorStage.STAT, entryPath));
        return false;
      }
      if (visited.has(real)) {
        this.log.debug(`skipping ${entryPath}: ${real} already visited`);
        return false;
      }
      visited.add(real);
      return true;
    };

    const followLink = async (linkPath: string, relative: string) => {
      let target: fs.Stats;
      try {
        target = await fs.promises.stat(linkPath);
      } catch (err) {
        recordError(mapFsError(err, ErrorStage.STAT, linkPath));
        return;
      }
      if (target.isFile()) {
        if (await claim(linkPath)) await addFile(linkPath);
      } else if (target.isDirectory()) {
        if (await claim(linkPath)) await walk(linkPath, relative);
      }
    };

    const walk = async (dir: string, relative: string): Promise<void> => {
      let entries: fs.Dirent[];
      try {
        entries = await fs.promises.readdir(dir, { withFileTypes: true });
      } catch (err) {
        recordError(mapFsError(err, ErrorStage.LIST, dir));
        return;
      }
      entries.sort(byName);

      for (const entry of entries) {
        const childRelative = appendRelative(relative, entry.name);
        if (!ignore.isEmpty && ignore.isIgnored(childRelative)) continue;
        const childPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          if (!following || (await claim(childPath))) await walk(childPath, childRelative);
        } else if (entry.isFile()) {
          if (!following || (await claim(childPath))) await addFile(childPath);
        } else if (entry.isSymbolicLink() && following) {
          await followLink(childPath, childRelative);
        }
      }
    };

    await walk(root, '/');
    this.log.debug(`scanned ${root}: ${files.length} files, ${errors.length} skipped`);
    return { root, files, errors };
  }

  private async assertDirectory(root: string): Promise<void> {
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(root);
    } catch (err) {
      const mapped = mapFsError(err, ErrorStage.STAT, root);
      if (mapped.code === ErrorCode.NOT_FOUND) throw new NotFoundError(root);
      throw mapped;
    }
    if (!stat.isDirectory()) throw new NotFoundError(root, ErrorCode.NOT_A_DIRECTORY);
  }
}
