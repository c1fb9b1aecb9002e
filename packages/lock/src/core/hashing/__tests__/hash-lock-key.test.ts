import { hashLockKeyUint32 } from "../hash-lock-key"

describe("hashLockKeyUint32", () => {
  it("is deterministic", () => {
    expect(hashLockKeyUint32("fd:1")).toBe(hashLockKeyUint32("fd:1"))
  })

  it("returns an unsigned 32-bit integer", () => {
    for (const key of ["", "fd:1", "fd:2", "file:/tmp/app.0.log"]) {
      const value = hashLockKeyUint32(key)

      expect(Number.isInteger(value)).toBe(true)
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThanOrEqual(0xffffffff)
    }
  })

  it("spreads nearby keys apart", () => {
    expect(hashLockKeyUint32("fd:1")).not.toBe(hashLockKeyUint32("fd:2"))
  })
})
