export { AtomicsLock, DEFAULT_ATOMICS_LOCK_CONFIG } from "./adapters/atomics/atomics-lock"
export type { AtomicsLockConfig, AtomicsLockDeps } from "./adapters/atomics/atomics-lock"
export { MemoryLock } from "./adapters/memory/memory-lock"
export { hashLockKeyUint32 } from "./core/hashing/hash-lock-key"
export { tryWithLock, withLock } from "./core/with-lock"
export type { Lock, LockKey } from "./ports/lock"
export type { LockLease } from "./ports/lock-lease"
export type { AcquireOptions, LockConfig } from "./ports/options"
export type { Milliseconds } from "./ports/time"
