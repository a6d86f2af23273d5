import { CacheLockError } from "../errors";

/**
 * Single-writer token shared by a family of caches.
 *
 * JavaScript runs each `set` to completion, so contention can only come from a
 * mutation that starts while another is still on the stack. That is a bug, and it
 * is reported rather than allowed to interleave with an eviction pass.
 */
export class WriteLock {
  private held = false;

  get isHeld(): boolean {
    return this.held;
  }

  runExclusive<T>(fn: () => T): T {
    if (this.held) {
      throw new CacheLockError();
    }
    this.held = true;
    try {
      return fn();
    } finally {
      this.held = false;
    }
  }
}
