import type { Milliseconds } from "./time"

export type AcquireOptions = {
  /** Max time to wait for acquisition. Falls back to `LockConfig.defaultTimeoutMs` if omitted. */
  timeoutMs?: Milliseconds
}

export type LockConfig = {
  /** Default timeout for `acquire()` when `timeoutMs` is omitted. */
  defaultTimeoutMs: Milliseconds
}
