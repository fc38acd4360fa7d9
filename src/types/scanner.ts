import type { AccessError } from '../errors.js';
import type { FileDescriptor } from '../descriptor/FileDescriptor.js';
import type { IgnoreRules, SymlinkPolicy } from './scanPolicy.js';

/** A per-entry failure the scanner skipped over. */
export interface ScanError {
  path: string;
  cause: AccessError;
}

export interface ScanResult {
  /** Absolute path of the scanned root. */
  root: string;
  files: FileDescriptor[];
  errors: ScanError[];
}

export interface ScanOptions {
  ignore: IgnoreRules;
  symlinkPolicy: SymlinkPolicy;
  onError?: (error: ScanError) => void;
}

export type DescriptorFactory = (filePath: string) => Promise<FileDescriptor>;
