import { threadId } from "node:worker_threads"
import { hashLockKeyUint32 } from "../../core/hashing/hash-lock-key"
import { assertPositiveInteger, assertValidTimeMs } from "../../core/validation/validation"
import type { Lock, LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type { AcquireOptions, LockConfig } from "../../ports/options"
import type { Milliseconds } from "../../ports/time"
import { AtomicsLease } from "./atomics-lock-lease"

const FREE = 0

// A held slot stores `ownerId * OWNER_SPAN + generation`, so a stale lease of
// the same owner never matches the current holder.
const OWNER_SPAN = 0x10000
const MAX_OWNER_ID = 0x7fff

export type AtomicsLockDeps = {
  /**
   * Shared memory backing the lock slots. Hand the same buffer to every worker
   * thread that must be excluded. A fresh buffer is allocated when omitted.
   */
  buffer?: SharedArrayBuffer

  /** Id of this thread, 1 to 32767. Defaults to `threadId + 1`. */
  ownerId?: number

  hashKey?: (key: LockKey) => number
  nowMs?: () => Milliseconds
}

export type AtomicsLockConfig = LockConfig & {
  /** Number of lock slots. Keys hashing to the same slot contend with each other. */
  slots: number
}

export const DEFAULT_ATOMICS_LOCK_CONFIG: AtomicsLockConfig = {
  defaultTimeoutMs: 1_000,
  slots: 64,
}

/**
 * Cross-thread advisory lock over a `SharedArrayBuffer`.
 *
 * Each slot holds `0` when free or a token naming the owner while held.
 * Waiters park on the slot with `Atomics.wait` and are woken by the
 * releasing thread.
 */
export class AtomicsLock implements Lock {
  private readonly shared: SharedArrayBuffer
  private readonly slots: Int32Array
  private readonly ownerId: number
  private readonly hashKey: (key: LockKey) => number
  private readonly nowMs: () => Milliseconds
  private generation = 0

  public constructor(
    deps: AtomicsLockDeps = {},
    private readonly config: AtomicsLockConfig = DEFAULT_ATOMICS_LOCK_CONFIG,
  ) {
    assertPositiveInteger(config.slots, "slots")
    assertValidTimeMs(config.defaultTimeoutMs, "defaultTimeoutMs")

    const buffer =
      deps.buffer ?? new SharedArrayBuffer(config.slots * Int32Array.BYTES_PER_ELEMENT)

    if (buffer.byteLength < config.slots * Int32Array.BYTES_PER_ELEMENT) {
      throw new Error(
        `Shared buffer holds ${buffer.byteLength} bytes, ${config.slots} slots need ${config.slots * Int32Array.BYTES_PER_ELEMENT}`,
      )
    }

    this.shared = buffer
    this.slots = new Int32Array(buffer, 0, config.slots)
    this.ownerId = deps.ownerId ?? threadId + 1
    this.hashKey = deps.hashKey ?? hashLockKeyUint32
    this.nowMs = deps.nowMs ?? Date.now

    assertPositiveInteger(this.ownerId, "ownerId")

    if (this.ownerId > MAX_OWNER_ID) {
      throw new Error(`ownerId must be at most ${MAX_OWNER_ID}, got: ${this.ownerId}`)
    }
  }

  /** The shared memory to pass to worker threads. */
  public get buffer(): SharedArrayBuffer {
    return this.shared
  }

  public acquire(key: LockKey, opts: AcquireOptions = {}): LockLease | null {
    const timeoutMs = opts.timeoutMs ?? this.config.defaultTimeoutMs

    assertValidTimeMs(timeoutMs, "acquire timeoutMs")

    const slot = this.slotFor(key)
    const deadline = this.nowMs() + timeoutMs

    while (true) {
      const token = this.nextToken()
      const holder = Atomics.compareExchange(this.slots, slot, FREE, token)

      if (holder === FREE) return this.lease(key, slot, token)
      if (this.isOwnToken(holder)) return null

      const remaining = deadline - this.nowMs()
      if (remaining <= 0) return null

      Atomics.wait(this.slots, slot, holder, remaining)
    }
  }

  public tryAcquire(key: LockKey): LockLease | null {
    const slot = this.slotFor(key)
    const token = this.nextToken()

    if (Atomics.compareExchange(this.slots, slot, FREE, token) !== FREE) {
      return null
    }

    return this.lease(key, slot, token)
  }

  private slotFor(key: LockKey): number {
    return this.hashKey(key) % this.config.slots
  }

  private nextToken(): number {
    this.generation = (this.generation % (OWNER_SPAN - 1)) + 1

    return this.ownerId * OWNER_SPAN + this.generation
  }

  private isOwnToken(token: number): boolean {
    return Math.floor(token / OWNER_SPAN) === this.ownerId
  }

  private lease(key: LockKey, slot: number, token: number): AtomicsLease {
    return new AtomicsLease(key, { slots: this.slots, slot, token })
  }
}
