import { createHash, type Hash } from 'node:crypto';

export const HASH_ALGORITHMS = ['md5', 'sha1', 'sha256'] as const;

export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export function isHashAlgorithm(value: string): value is HashAlgorithm {
  return HASH_ALGORITHMS.some((algorithm) => algorithm === value);
}

export function createDigest(algorithm: HashAlgorithm): Hash {
  return createHash(algorithm);
}
