import { DuplicateClassifier } from './classify/DuplicateClassifier.js';
import { DirectoryComparer } from './compare/DirectoryComparer.js';
import { DEFAULT_CONFIG, type FileTwinsConfig } from './config.js';
import { FileDescriptor } from './descriptor/FileDescriptor.js';
import { ActionPlanner } from './ops/ActionPlanner.js';
import { FileExecutor } from './ops/FileExecutor.js';
import { TreeScanner } from './scanner/TreeScanner.js';

export interface Engine {
  config: FileTwinsConfig;
  scanner: TreeScanner;
  classifier: DuplicateClassifier;
  comparer: DirectoryComparer;
  planner: ActionPlanner;
  executor: FileExecutor;
}

/** Wires every component from one configuration. */
export function createEngine(config: FileTwinsConfig = DEFAULT_CONFIG): Engine {
  const descriptorOptions = {
    prefixLength: config.prefixLength,
    chunkSize: config.chunkSize,
    hashAlgorithm: config.hashAlgorithm
  };
  const scanner = new TreeScanner(
    { ignore: config.ignore, symlinkPolicy: config.symlinkPolicy },
    (filePath) => FileDescriptor.create(filePath, descriptorOptions)
  );
  return {
    config,
    scanner,
    classifier: new DuplicateClassifier({ concurrency: config.concurrency }),
    comparer: new DirectoryComparer(scanner, { strategy: config.compareStrategy, concurrency: config.concurrency }),
    planner: new ActionPlanner(),
    executor: new FileExecutor()
  };
}
