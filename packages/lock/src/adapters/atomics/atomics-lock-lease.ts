import type { LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"

export type AtomicsLeaseState = {
  slots: Int32Array
  slot: number
  token: number
}

export class AtomicsLease implements LockLease {
  public readonly key: LockKey
  private readonly state: AtomicsLeaseState

  private released = false

  public constructor(key: LockKey, state: AtomicsLeaseState) {
    this.key = key
    this.state = state
  }

  public release(): void {
    if (this.released) return

    this.released = true

    const { slots, slot, token } = this.state

    // Only clear the slot if this lease still holds it.
    if (Atomics.compareExchange(slots, slot, token, 0) === token) {
      Atomics.notify(slots, slot)
    }
  }
}
