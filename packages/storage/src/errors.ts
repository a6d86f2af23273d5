export type StorageErrorCode = "NOT_FOUND" | "KEY_EXISTS" | "LOCK_HELD";

export class StorageError extends Error {
  public readonly code: StorageErrorCode;
  public readonly cause?: unknown;
  public readonly metadata?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code: StorageErrorCode;
      cause?: unknown;
      metadata?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = "StorageError";
    this.code = options.code;
    this.cause = options.cause;
    this.metadata = options.metadata;
  }
}

export class NotFoundError extends StorageError {
  constructor(message = "Cache entry not found", metadata?: Record<string, unknown>) {
    super(message, { code: "NOT_FOUND", metadata });
    this.name = "NotFoundError";
  }
}

/** Raised by `TtlCache.set` instead of overwriting a live entry. */
export class KeyExistsError<V = unknown> extends StorageError {
  public readonly existing: V;

  constructor(existing: V, message = "Cache key already holds a live entry", metadata?: Record<string, unknown>) {
    super(message, { code: "KEY_EXISTS", metadata });
    this.name = "KeyExistsError";
    this.existing = existing;
  }
}

export class CacheLockError extends StorageError {
  constructor(message = "Cache write lock is already held") {
    super(message, { code: "LOCK_HELD" });
    this.name = "CacheLockError";
  }
}
