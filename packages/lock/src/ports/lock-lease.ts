import type { LockKey } from "./lock"

export interface LockLease {
  /** The key this lease holds. */
  readonly key: LockKey

  /**
   * Release the lock if still owned. Idempotent: safe to call multiple times.
   */
  release(): void
}
