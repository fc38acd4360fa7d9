import fs from 'node:fs';
import readline from 'node:readline/promises';
import { Command, Option, type OptionValues } from 'commander';
import { loadConfig, mergeConfig, parseConfig, type FileTwinsConfig } from './config.js';
import { createEngine, type Engine } from './engine.js';
import { LOG_LEVELS, setLogLevel } from './logger.js';
import { summarizeByCategory } from './report/categories.js';
import {
  formatBytes,
  formatCategories,
  formatComparison,
  formatGroups,
  formatPlan,
  formatReport,
  formatScanErrors,
  formatStats
} from './report/format.js';
import { CompareStrategy } from './types/compare.js';
import { KeepPolicy, type OperationPlan } from './types/operations.js';
import { SymlinkPolicy } from './types/scanPolicy.js';
import type { ScanError } from './types/scanner.js';
import { HASH_ALGORITHMS } from './utils/crypto.js';

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
  /** Asks a yes/no question; resolves true only on an explicit yes. */
  confirm(question: string): Promise<boolean>;
}

const STRATEGY_FLAGS: Record<string, CompareStrategy> = {
  'full-hash': CompareStrategy.FULL_HASH,
  'size-prefilter': CompareStrategy.SIZE_PREFILTER
};

const KEEP_FLAGS: Record<string, KeepPolicy> = {
  first: KeepPolicy.FIRST,
  oldest: KeepPolicy.OLDEST,
  newest: KeepPolicy.NEWEST
};

function readVersion(): string {
  const parsed: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

function parseCount(value: string): number {
  const parsed = Number(value);
  // parseConfig rejects anything that is not a positive integer.
  return Number.isNaN(parsed) ? -1 : parsed;
}

/** Maps command-line flags onto configuration keys and validates them like a config file. */
function configFromFlags(values: OptionValues): FileTwinsConfig {
  const configFile: unknown = values.config;
  const base = loadConfig(typeof configFile === 'string' ? configFile : undefined);

  const raw: Record<string, unknown> = {};
  if (values.concurrency !== undefined) raw.concurrency = values.concurrency;
  if (values.hash !== undefined) raw.hashAlgorithm = values.hash;
  if (values.logLevel !== undefined) raw.logLevel = values.logLevel;
  if (values.followSymlinks === true) raw.symlinkPolicy = SymlinkPolicy.FOLLOW;
  const strategy: unknown = values.strategy;
  if (typeof strategy === 'string') raw.compareStrategy = STRATEGY_FLAGS[strategy];
  const overrides = parseConfig(raw, 'command line');

  const ignore: unknown = values.ignore;
  const extraGlobs = Array.isArray(ignore) ? ignore.filter((item): item is string => typeof item === 'string') : [];
  const merged = mergeConfig(base, overrides);
  return { ...merged, ignore: { ...merged.ignore, glob: [...merged.ignore.glob, ...extraGlobs] } };
}

function print(write: (text: string) => void, lines: readonly string[]): void {
  for (const line of lines) write(`${line}\n`);
}

/**
 * Builds the `filetwins` command tree. Output goes through `io` so the
 * program can be driven in-process; errors from a command reject
 * `parseAsync` and nothing partial is printed for that command.
 */
export function createProgram(io: CliIo): Command {
  const program = new Command();

  program
    .name('filetwins')
    .description('Find duplicate files by content within and across directory trees')
    .version(readVersion())
    .configureOutput({ writeOut: (text) => io.out(text), writeErr: (text) => io.err(text) })
    .option('-c, --config <file>', 'YAML or JSON configuration file')
    .option('--concurrency <n>', 'maximum files read at once', parseCount)
    .addOption(new Option('--hash <algorithm>', 'content digest').choices(HASH_ALGORITHMS))
    .option('--ignore <glob...>', 'skip paths matching these globs')
    .option('--follow-symlinks', 'descend into symbolic links')
    .addOption(new Option('--strategy <name>', 'cross-tree compare strategy').choices(Object.keys(STRATEGY_FLAGS)))
    .addOption(new Option('--log-level <level>', 'diagnostics written to stderr').choices(LOG_LEVELS));

  const engineFor = (command: Command): Engine => {
    const config = configFromFlags(command.optsWithGlobals());
    setLogLevel(config.logLevel);
    return createEngine(config);
  };

  const reportSkipped = (errors: readonly ScanError[]) => print(io.err, formatScanErrors(errors));

  const runPlan = async (engine: Engine, plan: OperationPlan, verb: string, yes: boolean) => {
    if (plan.ops.length === 0) {
      io.out('nothing to do\n');
      return;
    }
    const checked = await engine.executor.dryRun(plan);
    print(io.out, formatPlan(checked));
    const preflight = checked.preflight;
    const bytes = preflight ? preflight.bytesToCopy + preflight.bytesToDelete : 0;
    const report = await engine.executor.execute(checked, {
      confirm: () => yes || io.confirm(`${verb} ${checked.ops.length} files (${formatBytes(bytes)})?`)
    });
    print(io.out, [formatReport(report)]);
    for (const result of report.results) {
      if (result.error) io.err(`failed ${result.opId}: ${result.error.message}\n`);
    }
  };

  program
    .command('scan <dir>')
    .description('List groups of identical files under a directory')
    .action(async (dir: string, _options: OptionValues, command: Command) => {
      const engine = engineFor(command);
      const result = await engine.scanner.scan(dir);
      const { groups, stats } = await engine.classifier.analyze(result.files);
      reportSkipped(result.errors);
      print(io.out, formatGroups(groups.values(), result.root));
      print(io.out, [formatStats(stats)]);
    });

  program
    .command('categories <dir>')
    .description('Total file sizes per category under a directory')
    .action(async (dir: string, _options: OptionValues, command: Command) => {
      const engine = engineFor(command);
      const result = await engine.scanner.scan(dir);
      reportSkipped(result.errors);
      print(io.out, formatCategories(summarizeByCategory(result.files)));
    });

  program
    .command('compare <dirA> <dirB>')
    .description('Split the files of dirB into those whose content exists in dirA and the rest')
    .action(async (dirA: string, dirB: string, _options: OptionValues, command: Command) => {
      const engine = engineFor(command);
      const comparison = await engine.comparer.compare(dirA, dirB);
      reportSkipped(comparison.errors);
      print(io.out, formatComparison(comparison));
    });

  program
    .command('delete-duplicates <dirA> <dirB>')
    .description('Delete the files of dirB whose content already exists in dirA')
    .option('-y, --yes', 'do not ask for confirmation')
    .action(async (dirA: string, dirB: string, options: OptionValues, command: Command) => {
      const engine = engineFor(command);
      const comparison = await engine.comparer.compare(dirA, dirB);
      reportSkipped(comparison.errors);
      await runPlan(engine, engine.planner.planDeletion(comparison), 'delete', options.yes === true);
    });

  program
    .command('propagate <dirA> <dirB>')
    .description('Copy the files of dirB that have no counterpart in dirA into dirA')
    .option('-y, --yes', 'do not ask for confirmation')
    .action(async (dirA: string, dirB: string, options: OptionValues, command: Command) => {
      const engine = engineFor(command);
      const comparison = await engine.comparer.compare(dirA, dirB);
      reportSkipped(comparison.errors);
      await runPlan(engine, await engine.planner.planPropagation(comparison), 'copy', options.yes === true);
    });

  program
    .command('dedupe <dir>')
    .description('Keep one file of every duplicate group under a directory and delete the rest')
    .addOption(new Option('--keep <which>', 'member that survives').choices(Object.keys(KEEP_FLAGS)).default('first'))
    .option('-y, --yes', 'do not ask for confirmation')
    .action(async (dir: string, options: OptionValues, command: Command) => {
      const engine = engineFor(command);
      const result = await engine.scanner.scan(dir);
      reportSkipped(result.errors);
      const groups = await engine.classifier.classify(result.files);
      const keep: unknown = options.keep;
      const policy = typeof keep === 'string' ? KEEP_FLAGS[keep] : undefined;
      await runPlan(engine, engine.planner.planGroupDeletion(groups.values(), policy), 'delete', options.yes === true);
    });

  return program;
}

/** Reads a yes/no answer from the terminal; anything but y or yes is a no. */
export async function promptConfirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
  try {
    const answer = await rl.question(`${question} [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}
