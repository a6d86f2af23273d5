import { KeyExistsError, NotFoundError } from "../errors";
import { TtlCache, type Clock } from "./ttlCache";
import { WriteLock } from "./writeLock";

export const DEFAULT_NONCE_TTL_SECONDS = 60;

export interface NonceCacheOptions {
  nonceTtlSeconds?: number;
  /** Defaults to `nonceTtlSeconds`. */
  idTtlSeconds?: number;
  /** Applies to the identity cache and to each identity's nonce cache separately. */
  maxSize?: number;
  now?: Clock;
}

interface IdentityRecord {
  /** Server clock minus client clock, in milliseconds, fixed when the identity is first seen. */
  skewMs: number;
  nonces: TtlCache<string, true>;
}

/**
 * Replay protection for MAC-signed requests.
 *
 * Keeps one clock-skew estimate and one nonce cache per identity. A nonce is
 * accepted once per identity within the nonce TTL, and only when its
 * skew-adjusted timestamp is within the TTL of the server clock.
 *
 * With `maxSize` set, live entries can be evicted under pressure, which reopens a
 * small replay window for the evicted nonces.
 */
export class NonceCache {
  readonly nonceTtlMs: number;
  readonly idTtlMs: number;
  readonly maxSize?: number;
  private readonly now: Clock;
  private readonly lock = new WriteLock();
  private readonly identities: TtlCache<string, IdentityRecord>;

  constructor(options: NonceCacheOptions = {}) {
    const nonceTtlSeconds = options.nonceTtlSeconds ?? DEFAULT_NONCE_TTL_SECONDS;
    this.nonceTtlMs = nonceTtlSeconds * 1000;
    this.idTtlMs = (options.idTtlSeconds ?? nonceTtlSeconds) * 1000;
    this.maxSize = options.maxSize;
    this.now = options.now ?? (() => Date.now());
    this.identities = new TtlCache({
      ttlMs: this.idTtlMs,
      maxSize: this.maxSize,
      lock: this.lock,
      now: this.now
    });
  }

  /**
   * Returns `true` and records the nonce if it is fresh for `id`, `false` otherwise.
   *
   * @param timestamp - client timestamp in seconds since the epoch
   */
  checkNonce(id: string, timestamp: number, nonce: string): boolean {
    const now = this.now();
    const { skewMs, nonces } = this.identityFor(id, timestamp, now);

    const adjusted = timestamp * 1000 + skewMs;
    if (Math.abs(adjusted - now) >= this.nonceTtlMs) {
      return false;
    }

    try {
      nonces.set(nonce, true, adjusted);
      return true;
    } catch (error) {
      if (error instanceof KeyExistsError) {
        return false;
      }
      throw error;
    }
  }

  /** Live nonces across live identities. Walks every identity. */
  get size(): number {
    let total = 0;
    for (const id of this.identities.keys()) {
      try {
        total += this.identities.get(id).nonces.countLive();
      } catch (error) {
        // expired between the key scan and the read
        if (!(error instanceof NotFoundError)) throw error;
      }
    }
    return total;
  }

  private identityFor(id: string, timestamp: number, now: number): IdentityRecord {
    try {
      return this.identities.get(id);
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
    }

    const record: IdentityRecord = {
      skewMs: now - timestamp * 1000,
      nonces: new TtlCache({
        ttlMs: this.nonceTtlMs,
        maxSize: this.maxSize,
        lock: this.lock,
        now: this.now
      })
    };

    try {
      this.identities.set(id, record, now);
      return record;
    } catch (error) {
      if (!(error instanceof KeyExistsError)) throw error;
      // Another writer registered this identity first; its skew estimate wins.
      return this.identities.get(id);
    }
  }
}
