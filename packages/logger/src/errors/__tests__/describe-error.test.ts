import { causeChain, describeError } from "../describe-error"

describe("causeChain", () => {
  it("lists the error and its causes, outermost first", () => {
    const root = new Error("root")
    const middle = new Error("middle", { cause: root })
    const top = new Error("top", { cause: middle })

    expect(causeChain(top)).toEqual([top, middle, root])
  })

  it("stops at cycles", () => {
    const a = new Error("a")
    const b = new Error("b", { cause: a })
    a.cause = b

    expect(causeChain(a)).toEqual([a, b])
  })

  it("stops after ten links", () => {
    let err = new Error("0")
    for (let i = 1; i < 15; i++) err = new Error(String(i), { cause: err })

    expect(causeChain(err)).toHaveLength(10)
  })

  it("is empty for null and undefined", () => {
    expect(causeChain(undefined)).toEqual([])
    expect(causeChain(null)).toEqual([])
  })
})

describe("describeError", () => {
  it("includes a string code", () => {
    const err = Object.assign(new Error("no such file"), { code: "ENOENT" })

    expect(describeError(err)).toBe("Error (ENOENT): no such file")
  })

  it("joins causes with arrows", () => {
    const err = new RangeError("outer", { cause: new Error("inner") })

    expect(describeError(err)).toBe("RangeError: outer <- Error: inner")
  })

  it("renders thrown non-errors", () => {
    expect(describeError("plain")).toBe("plain")
    expect(describeError(42)).toBe("42")
    expect(describeError({ reason: "x" })).toBe('{"reason":"x"}')
  })

  it("falls back to String() for values JSON can't encode", () => {
    expect(describeError(10n)).toBe("10")
  })
})
