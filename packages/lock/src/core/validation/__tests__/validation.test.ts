import { assertPositiveInteger, assertValidTimeMs } from "../validation"

describe("assertValidTimeMs", () => {
  it("accepts zero and positive finite values", () => {
    expect(() => assertValidTimeMs(0, "timeoutMs")).not.toThrow()
    expect(() => assertValidTimeMs(12.5, "timeoutMs")).not.toThrow()
  })

  it.each([-1, Infinity, Number.NaN])("rejects %s", (value) => {
    expect(() => assertValidTimeMs(value, "timeoutMs")).toThrow(
      `timeoutMs must be a finite, non-negative number, got: ${value}`,
    )
  })
})

describe("assertPositiveInteger", () => {
  it("accepts positive integers", () => {
    expect(() => assertPositiveInteger(1, "slots")).not.toThrow()
  })

  it.each([0, -3, 1.5])("rejects %s", (value) => {
    expect(() => assertPositiveInteger(value, "slots")).toThrow(
      `slots must be a positive integer, got: ${value}`,
    )
  })
})
