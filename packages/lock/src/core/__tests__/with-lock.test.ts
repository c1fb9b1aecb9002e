import type { Lock } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"

import { tryWithLock, withLock } from "../with-lock"

function makeLease(): LockLease {
  return {
    key: "test:key",
    release: vi.fn(),
  }
}

function makeLock(overrides?: Partial<Lock>): Lock {
  return {
    acquire: vi.fn(() => null),
    tryAcquire: vi.fn(() => null),
    ...overrides,
  }
}

describe("tryWithLock", () => {
  it("acquires lock, runs fn, and releases", () => {
    const lease = makeLease()
    const lock = makeLock({ tryAcquire: vi.fn(() => lease) })

    const fn = vi.fn(() => "ok")

    const res = tryWithLock(lock, "k", fn)

    expect(res).toBe("ok")
    expect(lock.tryAcquire).toHaveBeenCalledWith("k")
    expect(fn).toHaveBeenCalledTimes(1)
    expect(lease.release).toHaveBeenCalledTimes(1)
  })

  it("returns null without running fn when lock cannot be acquired", () => {
    const lock = makeLock()
    const fn = vi.fn(() => "should-not-run")

    const res = tryWithLock(lock, "k", fn)

    expect(res).toBeNull()
    expect(fn).not.toHaveBeenCalled()
  })

  it("releases lock even when fn throws", () => {
    const lease = makeLease()
    const lock = makeLock({ tryAcquire: vi.fn(() => lease) })

    const err = new Error("boom")
    const fn = vi.fn(() => {
      throw err
    })

    expect(() => tryWithLock(lock, "k", fn)).toThrow(err)
    expect(lease.release).toHaveBeenCalledTimes(1)
  })
})

describe("withLock", () => {
  it("acquires lock, runs fn, and releases", () => {
    const lease = makeLease()
    const lock = makeLock({ acquire: vi.fn(() => lease) })

    const fn = vi.fn(() => 123)

    const res = withLock(lock, "k", fn, { timeoutMs: 10 })

    expect(res).toBe(123)
    expect(lock.acquire).toHaveBeenCalledWith("k", { timeoutMs: 10 })
    expect(fn).toHaveBeenCalledTimes(1)
    expect(lease.release).toHaveBeenCalledTimes(1)
  })

  it("passes empty options when none are given", () => {
    const lease = makeLease()
    const lock = makeLock({ acquire: vi.fn(() => lease) })

    withLock(lock, "k", () => undefined)

    expect(lock.acquire).toHaveBeenCalledWith("k", {})
  })

  it("throws when lock cannot be acquired", () => {
    const lock = makeLock()
    const fn = vi.fn(() => "should-not-run")

    expect(() => withLock(lock, "k", fn)).toThrow('Failed to acquire lock "k"')
    expect(fn).not.toHaveBeenCalled()
  })

  it("propagates fn error after releasing lock", () => {
    const lease = makeLease()
    const lock = makeLock({ acquire: vi.fn(() => lease) })

    const err = new Error("boom")
    const fn = vi.fn(() => {
      throw err
    })

    try {
      withLock(lock, "k", fn)
      expect.unreachable("expected to throw")
    } catch (e) {
      expect(e).toBe(err)
      expect(lease.release).toHaveBeenCalledTimes(1)
    }
  })
})
