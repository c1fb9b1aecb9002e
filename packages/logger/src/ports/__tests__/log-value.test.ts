import { isLoggable, type Loggable, renderLogValue, renderLogValues } from "../log-value"

class Money implements Loggable {
  constructor(
    private readonly cents: number,
    private readonly currency: string,
  ) {}

  toLogString(): string {
    return `${(this.cents / 100).toFixed(2)} ${this.currency}`
  }
}

describe("renderLogValue", () => {
  it.each([
    ["text", "text"],
    [12.5, "12.5"],
    [7n, "7"],
    [false, "false"],
  ])("renders %o as %s", (value, expected) => {
    expect(renderLogValue(value)).toBe(expected)
  })

  it("renders nothing for null and undefined", () => {
    expect(renderLogValue(null)).toBeUndefined()
    expect(renderLogValue(undefined)).toBeUndefined()
  })

  it("renders dates as ISO strings", () => {
    expect(renderLogValue(new Date(Date.UTC(2024, 5, 1, 8, 0, 0)))).toBe("2024-06-01T08:00:00.000Z")
  })

  it("renders invalid dates without throwing", () => {
    expect(renderLogValue(new Date(Number.NaN))).toBe("Invalid Date")
  })

  it("renders errors with their name", () => {
    expect(renderLogValue(new TypeError("not a number"))).toBe("TypeError: not a number")
  })

  it("asks Loggable values to render themselves", () => {
    expect(renderLogValue(new Money(1999, "EUR"))).toBe("19.99 EUR")
  })

  it("renders a placeholder when toLogString() throws", () => {
    const broken: Loggable = {
      toLogString() {
        throw new Error("boom")
      },
    }

    expect(renderLogValue(broken)).toBe("<toLogString failed: boom>")
  })
})

describe("renderLogValues", () => {
  it("joins with single spaces and skips absent values", () => {
    expect(renderLogValues(["paid", new Money(500, "USD"), undefined, "by", null, "card"])).toBe(
      "paid 5.00 USD by card",
    )
  })

  it("is empty for no values", () => {
    expect(renderLogValues([])).toBe("")
  })
})

describe("isLoggable", () => {
  it("requires a toLogString method", () => {
    expect(isLoggable(new Money(1, "EUR"))).toBe(true)
    expect(isLoggable({ toLogString: "nope" })).toBe(false)
    expect(isLoggable("text")).toBe(false)
    expect(isLoggable(null)).toBe(false)
  })
})
