import type { FileDescriptor } from '../descriptor/FileDescriptor.js';
import type { ScanError } from './scanner.js';

export enum CompareStrategy {
  /** Digest every file of both trees. */
  FULL_HASH = 'FULL_HASH',
  /** Digest only files whose size also occurs in the other tree. */
  SIZE_PREFILTER = 'SIZE_PREFILTER'
}

export enum TreeSide {
  A = 'A',
  B = 'B'
}

export interface CompareOptions {
  strategy: CompareStrategy;
  concurrency: number;
}

export interface ComparisonError extends ScanError {
  side: TreeSide;
}

/** Partition of tree B against tree A. `duplicates` and `unique` together hold every scanned file of B. */
export interface Comparison {
  rootA: string;
  rootB: string;
  duplicates: FileDescriptor[];
  unique: FileDescriptor[];
  errors: ComparisonError[];
}
