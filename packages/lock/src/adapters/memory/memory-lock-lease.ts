import type { LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"

export type MemoryLeaseDeps = {
  onRelease: () => void
}

export class MemoryLease implements LockLease {
  public readonly key: LockKey
  private readonly deps: MemoryLeaseDeps

  private released = false

  public constructor(key: LockKey, deps: MemoryLeaseDeps) {
    this.key = key
    this.deps = deps
  }

  public release(): void {
    if (this.released) return

    this.released = true
    this.deps.onRelease()
  }
}
