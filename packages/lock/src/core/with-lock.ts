import type { Lock, LockKey } from "../ports/lock"
import type { AcquireOptions } from "../ports/options"

export function tryWithLock<T>(lock: Lock, key: LockKey, fn: () => T): T | null {
  const lease = lock.tryAcquire(key)

  if (!lease) {
    return null
  }

  try {
    return fn()
  } finally {
    lease.release()
  }
}

export function withLock<T>(
  lock: Lock,
  key: LockKey,
  fn: () => T,
  opts: AcquireOptions = {},
): T {
  const lease = lock.acquire(key, opts)
  if (!lease) {
    throw new Error(`Failed to acquire lock "${key}"`)
  }

  try {
    return fn()
  } finally {
    lease.release()
  }
}
