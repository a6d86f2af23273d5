export * from "./errors";
export { TtlCache } from "./cache/ttlCache";
export type { Clock, TtlCacheOptions } from "./cache/ttlCache";
export { NonceCache, DEFAULT_NONCE_TTL_SECONDS } from "./cache/nonceCache";
export type { NonceCacheOptions } from "./cache/nonceCache";
export { PurgeQueue } from "./cache/purgeQueue";
export type { PurgeQueueItem } from "./cache/purgeQueue";
export { WriteLock } from "./cache/writeLock";
