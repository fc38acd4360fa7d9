import pLimit from 'p-limit';
import type { FileDescriptor } from '../descriptor/FileDescriptor.js';
import { ContentKeySet } from '../descriptor/equality.js';
import { componentLogger } from '../logger.js';
import type { TreeScanner } from '../scanner/TreeScanner.js';
import { CompareStrategy, TreeSide, type CompareOptions, type Comparison } from '../types/compare.js';
import type { ScanResult } from '../types/scanner.js';

export const DEFAULT_COMPARE_OPTIONS: CompareOptions = {
  strategy: CompareStrategy.FULL_HASH,
  concurrency: 8
};

function sizesOf(files: readonly FileDescriptor[]): Set<number> {
  return new Set(files.map((file) => file.size));
}

/**
 * Splits the files of tree B into those whose content also exists somewhere
 * in tree A and those that do not. Membership is decided by the
 * (size, content fingerprint) key, never by path or name.
 */
export class DirectoryComparer {
  private readonly log = componentLogger('comparer');

  constructor(
    private readonly scanner: TreeScanner,
    private readonly options: CompareOptions = DEFAULT_COMPARE_OPTIONS
  ) {}

  async compare(pathA: string, pathB: string): Promise<Comparison> {
    const left = await this.scanner.scan(pathA);
    const right = await this.scanner.scan(pathB);
    return this.compareScans(left, right);
  }

  async compareScans(left: ScanResult, right: ScanResult): Promise<Comparison> {
    const limit = pLimit(this.options.concurrency);
    const prefilter = this.options.strategy === CompareStrategy.SIZE_PREFILTER;

    // FULL_HASH digests everything; SIZE_PREFILTER skips files whose size has no counterpart.
    const sizesA = sizesOf(left.files);
    const sizesB = sizesOf(right.files);
    const candidatesA = prefilter ? left.files.filter((file) => sizesB.has(file.size)) : left.files;
    const isCandidateB = (file: FileDescriptor) => !prefilter || sizesA.has(file.size);

    const known = new ContentKeySet();
    let matches: boolean[];
    try {
      // Trees may overlap (B nested in A, A nested in B, or one tree twice).
      // A file that is also in B is no evidence: deleting B would take it too.
      const filesOfB = new Set(await Promise.all(right.files.map((file) => limit(() => file.realPath()))));
      const outsideB = await Promise.all(
        candidatesA.map((file) => limit(async () => !filesOfB.has(await file.realPath())))
      );
      const evidence = candidatesA.filter((_file, index) => outsideB[index]);
      await Promise.all(evidence.map((file) => limit(() => known.add(file))));
      matches = await Promise.all(
        right.files.map((file) => (isCandidateB(file) ? limit(() => known.has(file)) : Promise.resolve(false)))
      );
    } catch (err) {
      limit.clearQueue();
      throw err;
    }

    const duplicates: FileDescriptor[] = [];
    const unique: FileDescriptor[] = [];
    right.files.forEach((file, index) => {
      (matches[index] ? duplicates : unique).push(file);
    });

    this.log.debug(
      `${right.root} vs ${left.root}: ${duplicates.length} duplicates, ${unique.length} unique ` +
        `(${known.size} distinct contents in A)`
    );

    return {
      rootA: left.root,
      rootB: right.root,
      duplicates,
      unique,
      errors: [
        ...left.errors.map((error) => ({ ...error, side: TreeSide.A })),
        ...right.errors.map((error) => ({ ...error, side: TreeSide.B }))
      ]
    };
  }
}
