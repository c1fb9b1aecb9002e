import { ConfigurationError } from "../../errors/logger-error"
import { validateLabel, validatePathLabel } from "../label"

describe("validateLabel", () => {
  it("returns a usable label unchanged", () => {
    expect(validateLabel(" billing ")).toBe(" billing ")
  })

  it.each(["", " ", "\t\n"])("rejects %j", (label) => {
    expect(() => validateLabel(label)).toThrow(ConfigurationError)
  })
})

describe("validatePathLabel", () => {
  it("accepts a single path segment", () => {
    expect(validatePathLabel("billing.api")).toBe("billing.api")
  })

  it.each(["../x", "a/b", "a\\b", ".", "..", " "])("rejects %j", (label) => {
    expect(() => validatePathLabel(label)).toThrow(ConfigurationError)
  })
})
