import type { Lock, LockKey } from "../lock"
import type { Milliseconds } from "../time"

export type LockHarness = {
  name: string
  make: () => { lock: Lock }
  defaultTimeoutMs: () => Milliseconds
}

export function describeLockContract(h: LockHarness) {
  describe(`${h.name} (Lock contract)`, () => {
    describe("tryAcquire", () => {
      it("tryAcquire returns a lease and excludes further holders", () => {
        const { lock } = h.make()
        const key: LockKey = "contract:mutex"

        const a = lock.tryAcquire(key)
        expect(a).not.toBeNull()
        expect(a?.key).toBe(key)

        const b = lock.tryAcquire(key)
        expect(b).toBeNull()

        a!.release()

        const c = lock.tryAcquire(key)
        expect(c).not.toBeNull()

        c!.release()
      })

      it("release is idempotent", () => {
        const { lock } = h.make()
        const key: LockKey = "contract:idempotent"

        const lease = lock.tryAcquire(key)
        expect(lease).not.toBeNull()

        lease!.release()
        lease!.release()

        const again = lock.tryAcquire(key)
        expect(again).not.toBeNull()

        const blocked = lock.tryAcquire(key)
        expect(blocked).toBeNull()

        again!.release()
      })

      it("a stale lease does not release a later holder", () => {
        const { lock } = h.make()
        const key: LockKey = "contract:stale"

        const first = lock.tryAcquire(key)
        first!.release()

        const second = lock.tryAcquire(key)
        expect(second).not.toBeNull()

        first!.release()

        expect(lock.tryAcquire(key)).toBeNull()

        second!.release()
      })

      it("locks on different keys are independent", () => {
        const { lock } = h.make()

        const a = lock.tryAcquire("key:a")
        const b = lock.tryAcquire("key:b")

        expect(a).not.toBeNull()
        expect(b).not.toBeNull()

        a!.release()
        b!.release()
      })
    })

    describe("acquire", () => {
      it("acquire returns a lease when the key is free", () => {
        const { lock } = h.make()

        const lease = lock.acquire("contract:free", { timeoutMs: 0 })

        expect(lease).not.toBeNull()
        expect(lease?.key).toBe("contract:free")

        lease!.release()
      })

      it("acquire with timeoutMs=0 behaves like a one-shot attempt", () => {
        const { lock } = h.make()
        const key: LockKey = "contract:oneshot"

        const held = lock.tryAcquire(key)
        expect(held).not.toBeNull()

        const immediate = lock.acquire(key, { timeoutMs: 0 })

        expect(immediate).toBeNull()

        held!.release()
      })

      it("the holder gets null instead of waiting on itself", () => {
        const { lock } = h.make()
        const key: LockKey = "contract:self"

        const held = lock.tryAcquire(key)

        const start = Date.now()
        const again = lock.acquire(key, { timeoutMs: 5_000 })

        expect(again).toBeNull()
        expect(Date.now() - start).toBeLessThan(1_000)

        held!.release()
      })

      it("throws when timeoutMs is Infinity", () => {
        const { lock } = h.make()

        expect(() =>
          lock.acquire("contract:timeout-infinity", { timeoutMs: Infinity }),
        ).toThrow(/timeoutMs/i)
      })

      it("throws when timeoutMs is negative", () => {
        const { lock } = h.make()

        expect(() => lock.acquire("contract:timeout-negative", { timeoutMs: -1 })).toThrow(
          /timeoutMs/i,
        )
      })

      it("acquire uses defaultTimeoutMs when timeoutMs is omitted", () => {
        const { lock } = h.make()
        const key: LockKey = "contract:default-timeout"

        expect(h.defaultTimeoutMs()).toBeGreaterThanOrEqual(0)

        const lease = lock.acquire(key)

        expect(lease).not.toBeNull()

        lease!.release()
      })
    })
  })
}
