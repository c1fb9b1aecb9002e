import type { LockLease } from "./lock-lease"
import type { AcquireOptions } from "./options"

export type LockKey = string

/**
 * A synchronous advisory lock keyed by string.
 *
 * @remarks
 * Locks are not reentrant. A holder asking for a key it already holds gets
 * `null` immediately rather than waiting on itself.
 */
export interface Lock {
  /**
   * Acquire a lock for `key`, blocking the calling thread up to `timeoutMs`
   * if another holder has it.
   *
   * @returns The lease if acquired, or `null` if the timeout elapsed.
   */
  acquire(key: LockKey, opts?: AcquireOptions): LockLease | null

  /**
   * Attempt to acquire a lock for `key` without waiting.
   *
   * @returns The lease if acquired immediately, or `null` if the lock is held.
   */
  tryAcquire(key: LockKey): LockLease | null
}
