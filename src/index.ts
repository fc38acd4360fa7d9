import { DEFAULT_CONFIG, mergeConfig, type ConfigOverrides } from './config.js';
import type { FileDescriptor } from './descriptor/FileDescriptor.js';
import { createEngine } from './engine.js';
import type { DuplicateGroup } from './types/classify.js';
import type { Comparison } from './types/compare.js';
import type { ScanResult } from './types/scanner.js';

export * from './types/enums.js';
export * from './types/scanPolicy.js';
export * from './types/scanner.js';
export * from './types/classify.js';
export * from './types/compare.js';
export * from './types/operations.js';
export * from './errors.js';
export { DEFAULT_CONFIG, loadConfig, mergeConfig, parseConfig } from './config.js';
export type { ConfigOverrides, FileTwinsConfig } from './config.js';
export { componentLogger, logger, setLogLevel } from './logger.js';
export type { LogLevel } from './logger.js';
export { HASH_ALGORITHMS } from './utils/crypto.js';
export type { HashAlgorithm } from './utils/crypto.js';
export { FileDescriptor, DEFAULT_DESCRIPTOR_OPTIONS } from './descriptor/FileDescriptor.js';
export type { DescriptorOptions } from './descriptor/FileDescriptor.js';
export { ContentKeySet, contentEquals, contentKey } from './descriptor/equality.js';
export { TreeScanner, DEFAULT_SCAN_OPTIONS } from './scanner/TreeScanner.js';
export { IgnoreMatcher } from './scanner/ignore/IgnoreMatcher.js';
export { DuplicateClassifier, DEFAULT_CLASSIFIER_OPTIONS } from './classify/DuplicateClassifier.js';
export { DirectoryComparer, DEFAULT_COMPARE_OPTIONS } from './compare/DirectoryComparer.js';
export { ActionPlanner, survivorIndex } from './ops/ActionPlanner.js';
export { FileExecutor } from './ops/FileExecutor.js';
export { createEngine } from './engine.js';
export type { Engine } from './engine.js';
export { summarizeByCategory, categoryOf, OTHER_CATEGORY } from './report/categories.js';
export type { CategorySummary } from './report/categories.js';
export { formatBytes } from './report/format.js';

function engineFor(options: ConfigOverrides) {
  return createEngine(mergeConfig(DEFAULT_CONFIG, options));
}

/** Every regular file under `root`, with the entries that could not be read. */
export function scan(root: string, options: ConfigOverrides = {}): Promise<ScanResult> {
  return engineFor(options).scanner.scan(root);
}

/** Groups of identical content among `files`, keyed by content fingerprint. */
export function classify(
  files: readonly FileDescriptor[],
  options: ConfigOverrides = {}
): Promise<Map<string, DuplicateGroup>> {
  return engineFor(options).classifier.classify(files);
}

/** Splits the files of `pathB` by whether their content also exists in `pathA`. */
export function compare(pathA: string, pathB: string, options: ConfigOverrides = {}): Promise<Comparison> {
  return engineFor(options).comparer.compare(pathA, pathB);
}
