/**
 * Runtime configuration: defaults, an optional YAML/JSON file, then
 * environment and command-line overrides.
 */

import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import { ConfigError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';
import { isHashAlgorithm, type HashAlgorithm } from './utils/crypto.js';
import { SymlinkPolicy, type IgnoreRules } from './types/scanPolicy.js';
import { CompareStrategy } from './types/compare.js';

export interface FileTwinsConfig {
  hashAlgorithm: HashAlgorithm;
  /** Bytes read from the start of each candidate by the second filter stage. */
  prefixLength: number;
  chunkSize: number;
  /** Upper bound on fingerprint reads in flight. */
  concurrency: number;
  ignore: IgnoreRules;
  symlinkPolicy: SymlinkPolicy;
  compareStrategy: CompareStrategy;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: FileTwinsConfig = {
  hashAlgorithm: 'md5',
  prefixLength: 5,
  chunkSize: 4096,
  concurrency: 8,
  ignore: { glob: [], regex: [] },
  symlinkPolicy: SymlinkPolicy.DONT_FOLLOW,
  compareStrategy: CompareStrategy.FULL_HASH,
  logLevel: 'warn'
};

export type ConfigOverrides = Partial<Omit<FileTwinsConfig, 'ignore'>> & { ignore?: Partial<IgnoreRules> };

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function positiveInt(raw: RawConfig, key: string, source: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${key} must be a positive integer`, source);
  }
  return value;
}

function stringList(raw: RawConfig, key: string, source: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`ignore.${key} must be a list of strings`, source);
  }
  return value;
}

function oneOf<T extends string>(
  raw: RawConfig,
  key: string,
  source: string,
  guard: (value: string) => value is T
): T | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || !guard(value)) {
    throw new ConfigError(`${key} has an unsupported value: ${String(value)}`, source);
  }
  return value;
}

function isSymlinkPolicy(value: string): value is SymlinkPolicy {
  return Object.values<string>(SymlinkPolicy).includes(value);
}

function isCompareStrategy(value: string): value is CompareStrategy {
  return Object.values<string>(CompareStrategy).includes(value);
}

/** Validates a parsed config document; unknown keys are rejected. */
export function parseConfig(raw: unknown, source = '<inline>'): ConfigOverrides {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new ConfigError('configuration must be a mapping', source);
  }
  const known = new Set(Object.keys(DEFAULT_CONFIG));
  for (const key of Object.keys(raw)) {
    if (!known.has(key)) throw new ConfigError(`unknown configuration key: ${key}`, source);
  }

  const overrides: ConfigOverrides = {};
  const hashAlgorithm = oneOf(raw, 'hashAlgorithm', source, isHashAlgorithm);
  if (hashAlgorithm) overrides.hashAlgorithm = hashAlgorithm;
  const prefixLength = positiveInt(raw, 'prefixLength', source);
  if (prefixLength !== undefined) overrides.prefixLength = prefixLength;
  const chunkSize = positiveInt(raw, 'chunkSize', source);
  if (chunkSize !== undefined) overrides.chunkSize = chunkSize;
  const concurrency = positiveInt(raw, 'concurrency', source);
  if (concurrency !== undefined) overrides.concurrency = concurrency;
  const symlinkPolicy = oneOf(raw, 'symlinkPolicy', source, isSymlinkPolicy);
  if (symlinkPolicy) overrides.symlinkPolicy = symlinkPolicy;
  const compareStrategy = oneOf(raw, 'compareStrategy', source, isCompareStrategy);
  if (compareStrategy) overrides.compareStrategy = compareStrategy;
  const logLevel = oneOf(raw, 'logLevel', source, isLogLevel);
  if (logLevel) overrides.logLevel = logLevel;

  if (raw.ignore !== undefined) {
    if (!isRecord(raw.ignore)) throw new ConfigError('ignore must be a mapping', source);
    const glob = stringList(raw.ignore, 'glob', source);
    const regex = stringList(raw.ignore, 'regex', source);
    overrides.ignore = {};
    if (glob) overrides.ignore.glob = glob;
    if (regex) overrides.ignore.regex = regex;
  }
  return overrides;
}

export function mergeConfig(base: FileTwinsConfig, overrides: ConfigOverrides): FileTwinsConfig {
  return {
    hashAlgorithm: overrides.hashAlgorithm ?? base.hashAlgorithm,
    prefixLength: overrides.prefixLength ?? base.prefixLength,
    chunkSize: overrides.chunkSize ?? base.chunkSize,
    concurrency: overrides.concurrency ?? base.concurrency,
    ignore: {
      glob: overrides.ignore?.glob ?? base.ignore.glob,
      regex: overrides.ignore?.regex ?? base.ignore.regex
    },
    symlinkPolicy: overrides.symlinkPolicy ?? base.symlinkPolicy,
    compareStrategy: overrides.compareStrategy ?? base.compareStrategy,
    logLevel: overrides.logLevel ?? base.logLevel
  };
}

/**
 * Loads configuration from `file` (YAML or JSON, both read by js-yaml) over
 * the defaults. LOG_LEVEL in the environment wins over the file.
 */
export function loadConfig(file?: string, env: NodeJS.ProcessEnv = process.env): FileTwinsConfig {
  let config = DEFAULT_CONFIG;
  if (file) {
    const source = path.resolve(file);
    let text: string;
    try {
      text = fs.readFileSync(source, 'utf8');
    } catch (err) {
      throw new ConfigError(`cannot read configuration file ${source}`, source, { cause: err });
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(text, { filename: source });
    } catch (err) {
      throw new ConfigError(`cannot parse configuration file ${source}`, source, { cause: err });
    }
    config = mergeConfig(config, parseConfig(parsed, source));
  }
  const envLevel = env.LOG_LEVEL;
  if (envLevel !== undefined) {
    if (!isLogLevel(envLevel)) throw new ConfigError(`LOG_LEVEL has an unsupported value: ${envLevel}`, 'env');
    config = mergeConfig(config, { logLevel: envLevel });
  }
  return config;
}
