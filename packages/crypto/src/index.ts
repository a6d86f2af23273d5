export * from './errors';
export {
  HASH_ALGORITHMS,
  DEFAULT_HASH_ALGORITHM,
  assertHashAlgorithm,
  computeMac,
  isHashAlgorithm
} from './hmac';
export type { HashAlgorithm, MacKey } from './hmac';
export { DEFAULT_NONCE_BYTES, randomNonce } from './random';
export { constantTimeEqual } from './utils/compare';
