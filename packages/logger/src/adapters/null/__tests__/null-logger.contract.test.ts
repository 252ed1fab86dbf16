import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger contract", () => {
  it("never throws for any method", () => {
    const logger = new NullLogger()

    expect(() => logger.trace("x")).not.toThrow()
    expect(() => logger.debug("x")).not.toThrow()
    expect(() => logger.info("x")).not.toThrow()
    expect(() => logger.warn("x")).not.toThrow()
    expect(() => logger.error("x", { err: new Error("boom") })).not.toThrow()
    expect(() => logger.fatal("x")).not.toThrow()
  })

  it("child() returns another no-op logger", () => {
    const child = createNullLogger().child({ module: "resolver" })

    expect(child).toBeInstanceOf(NullLogger)
    expect(() => child.warn("x")).not.toThrow()
  })
})
