import type { HashAlgorithm } from '@macauth/crypto';
import { NonceCache } from '@macauth/storage';
import type { Logger } from 'pino';
import type { Config } from '../config';
import { InMemoryKeyResolver } from '../keys/inMemoryKeyResolver';
import type { KeyResolver } from '../keys/types';
import { GatewayMetrics } from '../observability/metrics';

export interface Container {
  config: Config;
  logger: Logger;
  algorithm: HashAlgorithm;
  keyResolver: KeyResolver;
  nonceCache: NonceCache;
  metrics: GatewayMetrics;
}

interface ContainerOptions {
  config: Config;
  logger: Logger;
  keyResolver?: KeyResolver;
}

export const createContainer = ({ config, logger, keyResolver }: ContainerOptions): Container => {
  const nonceCache = new NonceCache({
    nonceTtlSeconds: config.MAC_NONCE_TTL_SECONDS,
    idTtlSeconds: config.MAC_ID_TTL_SECONDS,
    maxSize: config.MAC_CACHE_MAX_SIZE
  });

  logger.info(
    {
      identities: config.MAC_KEYS.size,
      algorithm: config.MAC_HASH_ALGORITHM,
      nonceTtlSeconds: config.MAC_NONCE_TTL_SECONDS
    },
    'mac_auth_config_loaded'
  );

  return {
    config,
    logger,
    algorithm: config.MAC_HASH_ALGORITHM,
    keyResolver: keyResolver ?? new InMemoryKeyResolver(config.MAC_KEYS),
    nonceCache,
    metrics: new GatewayMetrics()
  };
};
