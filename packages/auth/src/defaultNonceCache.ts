import { loadConfig } from '@macauth/config';
import { NonceCache } from '@macauth/storage';

let defaultNonceCache: NonceCache | null = null;

/**
 * Process-wide cache used by `verify` when the caller passes none. Built from
 * configuration on first use and kept for the life of the process.
 */
export const getDefaultNonceCache = (): NonceCache => {
  if (!defaultNonceCache) {
    const config = loadConfig();
    defaultNonceCache = new NonceCache({
      nonceTtlSeconds: config.MAC_NONCE_TTL_SECONDS,
      idTtlSeconds: config.MAC_ID_TTL_SECONDS,
      maxSize: config.MAC_CACHE_MAX_SIZE
    });
  }
  return defaultNonceCache;
};

export const resetDefaultNonceCache = () => {
  defaultNonceCache = null;
};
