import type { ConfigSource } from "../config-source"

export type ConfigSourceHarness = {
  name: string
  make: () => ConfigSource
  expectedValue: () => Record<string, unknown>
}

export function describeConfigSourceContract(h: ConfigSourceHarness) {
  describe(`${h.name} (ConfigSource contract)`, () => {
    let source: ConfigSource

    beforeEach(() => {
      source = h.make()
    })

    it("has a name", () => {
      expect(typeof source.name).toBe("string")
      expect(source.name.length).toBeGreaterThan(0)
    })

    it("load() resolves to a plain object", async () => {
      const result = await source.load()

      expect(Array.isArray(result)).toBe(false)
      expect(Object.getPrototypeOf(result)).toBe(Object.prototype)
    })

    it("load() is idempotent", async () => {
      expect(await source.load()).toEqual(await source.load())
    })

    it("load() does not leak a mutable reference", async () => {
      const first = await source.load()
      first.__CONFIG_TEST_MUTATION__ = "x"

      expect(await source.load()).not.toHaveProperty("__CONFIG_TEST_MUTATION__")
    })

    it("load() returns expected values", async () => {
      expect(await source.load()).toEqual(h.expectedValue())
    })
  })
}
