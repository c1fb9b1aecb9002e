import { assertValidTimeMs } from "../../core/validation/validation"
import type { Lock, LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type { AcquireOptions } from "../../ports/options"
import { MemoryLease } from "./memory-lock-lease"

/**
 * Lock for callers that all live on one thread.
 *
 * @remarks
 * Nothing else can run while a synchronous caller waits, so a held key can
 * never be released during the wait: `acquire` answers like `tryAcquire`.
 */
export class MemoryLock implements Lock {
  private readonly held = new Map<LockKey, MemoryLease>()

  public acquire(key: LockKey, opts: AcquireOptions = {}): LockLease | null {
    if (opts.timeoutMs !== undefined) {
      assertValidTimeMs(opts.timeoutMs, "acquire timeoutMs")
    }

    return this.tryAcquire(key)
  }

  public tryAcquire(key: LockKey): LockLease | null {
    if (this.held.has(key)) return null

    const lease = new MemoryLease(key, {
      onRelease: () => {
        if (this.held.get(key) === lease) {
          this.held.delete(key)
        }
      },
    })

    this.held.set(key, lease)
    return lease
  }

  /** Number of keys currently held. */
  public get size(): number {
    return this.held.size
  }
}
