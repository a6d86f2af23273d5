import { createHmac } from 'node:crypto';
import { UnsupportedAlgorithmError } from './errors';

export const HASH_ALGORITHMS = ['sha1', 'sha256', 'sha384', 'sha512'] as const;

export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export const DEFAULT_HASH_ALGORITHM: HashAlgorithm = 'sha1';

export type MacKey = string | Uint8Array;

export const isHashAlgorithm = (value: unknown): value is HashAlgorithm =>
  HASH_ALGORITHMS.some((algorithm) => algorithm === value);

export function assertHashAlgorithm(value: unknown): asserts value is HashAlgorithm {
  if (!isHashAlgorithm(value)) {
    throw new UnsupportedAlgorithmError(String(value));
  }
}

/**
 * Base64 HMAC of `message` (UTF-8) under `key`.
 */
export const computeMac = (key: MacKey, message: string, algorithm: HashAlgorithm = DEFAULT_HASH_ALGORITHM) => {
  assertHashAlgorithm(algorithm);
  return createHmac(algorithm, key).update(message, 'utf8').digest('base64');
};
