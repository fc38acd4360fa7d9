import type { FileDescriptor } from '../descriptor/FileDescriptor.js';

/** Two or more pairwise content-equal files, in input order. */
export interface DuplicateGroup {
  fingerprint: string;
  size: number;
  files: FileDescriptor[];
}

export interface ClassifyStats {
  files: number;
  /** Files sharing their size with at least one other file. */
  sizeCandidates: number;
  /** Files that also share their leading bytes with another file of the same size. */
  prefixCandidates: number;
  /** Files whose whole content was digested. */
  hashed: number;
  groups: number;
  /** Files beyond the first in each group. */
  duplicates: number;
  reclaimableBytes: number;
}

export interface Classification {
  groups: Map<string, DuplicateGroup>;
  stats: ClassifyStats;
}

export interface ClassifierOptions {
  concurrency: number;
}
