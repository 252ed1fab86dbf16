import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const resolver = logger.child({ module: "resolver" })
      const lookup = resolver.child({ key: "window.outerWidth" })

      lookup.warn("unusable value")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        module: "resolver",
        key: "window.outerWidth",
      })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ variable: "MASK_CONFIG" })
      const child = parent.child({ variable: "MASK_CONFIG_1" })

      child.info("chunk read")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.variable).toBe("MASK_CONFIG_1")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: "trace" })

      const parent = logger.child({ module: "resolver" })
      const child = parent.child({ key: "voices" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ module: "resolver" })
      expect(logs[0]?.payload).not.toHaveProperty("key")
      expect(logs[1]?.payload).toMatchObject({ module: "resolver", key: "voices" })

      clear()
      expect(read()).toEqual([])
    })

    it("per-call meta merges with context (meta overrides)", () => {
      const { logger, read } = h.make({ level: "trace" })

      const scoped = logger.child({ source: "env" })
      scoped.info("hello", { source: "dotenv:.env" })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload.source).toBe("dotenv:.env")
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      const levels = read().map((l) => l.level)

      expect(levels).toEqual(["warn", "error"])
    })
  })
}
