import { KeyExistsError, NotFoundError } from "../errors";
import { PurgeQueue } from "./purgeQueue";
import { WriteLock } from "./writeLock";

export type Clock = () => number;

interface CacheEntry<V> {
  value: V;
  timestamp: number;
}

interface PurgeTarget<K, V> {
  key: K;
  entry: CacheEntry<V>;
}

export interface TtlCacheOptions {
  ttlMs: number;
  maxSize?: number;
  /** Shared with sibling caches so that all of their writes are serialized. */
  lock?: WriteLock;
  now?: Clock;
}

// Upper bound on expired entries reclaimed by one `set`.
const AGE_EVICTIONS_PER_WRITE = 5;

/**
 * Key/value store whose entries disappear `ttlMs` after their timestamp.
 *
 * Expiry is checked on every read; physical removal happens lazily during `set`,
 * driven by a min-heap of insertion timestamps. A live key is never overwritten:
 * `set` throws {@link KeyExistsError} instead, which lets callers use it as an
 * atomic insert-if-absent.
 *
 * When `maxSize` is set, inserting into a full cache evicts the oldest entry even
 * if it has not expired yet.
 */
export class TtlCache<K, V> implements Iterable<K> {
  readonly ttlMs: number;
  readonly maxSize?: number;
  private readonly lock: WriteLock;
  private readonly now: Clock;
  private readonly items = new Map<K, CacheEntry<V>>();
  private readonly purgeQueue = new PurgeQueue<PurgeTarget<K, V>>();

  constructor(options: TtlCacheOptions) {
    if (!(options.ttlMs > 0)) {
      throw new RangeError("ttlMs must be positive");
    }
    if (options.maxSize !== undefined && (!Number.isInteger(options.maxSize) || options.maxSize < 1)) {
      throw new RangeError("maxSize must be a positive integer");
    }
    this.ttlMs = options.ttlMs;
    this.maxSize = options.maxSize;
    this.lock = options.lock ?? new WriteLock();
    this.now = options.now ?? (() => Date.now());
  }

  /** Physical entry count, including entries that expired but were not yet evicted. */
  get size(): number {
    return this.items.size;
  }

  /** Unexpired entry count; walks the whole store. */
  countLive(): number {
    const now = this.now();
    let count = 0;
    for (const entry of this.items.values()) {
      if (!this.isExpired(entry, now)) count += 1;
    }
    return count;
  }

  get(key: K): V {
    const entry = this.items.get(key);
    if (!entry || this.isExpired(entry, this.now())) {
      throw new NotFoundError(undefined, { key: String(key) });
    }
    return entry.value;
  }

  contains(key: K): boolean {
    const entry = this.items.get(key);
    return entry !== undefined && !this.isExpired(entry, this.now());
  }

  set(key: K, value: V, timestamp?: number): void {
    const now = this.now();
    const entry: CacheEntry<V> = { value, timestamp: timestamp ?? now };

    this.lock.runExclusive(() => {
      const existing = this.items.get(key);
      if (existing && !this.isExpired(existing, now)) {
        throw new KeyExistsError(existing.value, undefined, { key: String(key) });
      }

      if (this.maxSize !== undefined && !existing) {
        while (this.items.size >= this.maxSize) {
          if (!this.evictOldest()) break;
        }
      }

      this.evictExpired(now);

      this.items.set(key, entry);
      this.purgeQueue.push(entry.timestamp, { key, entry });
    });
  }

  /**
   * Unexpired keys at the time each iteration starts. Every call to
   * `[Symbol.iterator]` starts a new pass; writes made during a pass may or may not be seen.
   */
  keys(): Iterable<K> {
    return { [Symbol.iterator]: () => this.liveKeys() };
  }

  [Symbol.iterator](): Iterator<K> {
    return this.liveKeys();
  }

  private *liveKeys(): Generator<K> {
    const now = this.now();
    for (const [key, entry] of this.items) {
      if (!this.isExpired(entry, now)) {
        yield key;
      }
    }
  }

  private isExpired(entry: CacheEntry<V>, now: number): boolean {
    return entry.timestamp + this.ttlMs < now;
  }

  /** Pops heap records until one removes a live entry. */
  private evictOldest(): boolean {
    for (;;) {
      const head = this.purgeQueue.pop();
      if (!head) return false;
      if (this.discard(head.payload)) return true;
    }
  }

  private evictExpired(now: number): void {
    const deadline = now - this.ttlMs;
    for (let i = 0; i < AGE_EVICTIONS_PER_WRITE; i += 1) {
      const head = this.purgeQueue.peek();
      if (!head || head.timestamp >= deadline) return;
      this.purgeQueue.pop();
      this.discard(head.payload);
    }
  }

  // A record is stale once its key has been rewritten; the live entry stays.
  private discard({ key, entry }: PurgeTarget<K, V>): boolean {
    if (this.items.get(key) !== entry) return false;
    this.items.delete(key);
    return true;
  }
}
