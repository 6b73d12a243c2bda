import { NullLogger } from "../null-logger"

describe("NullLogger contract", () => {
  it("never throws for any level", () => {
    const logger = new NullLogger()

    expect(() => {
      logger.trace("x")
      logger.debug("x")
      logger.info("x")
      logger.warn("x")
      logger.error("x")
      logger.fatal("x")
    }).not.toThrow()
  })

  it("child() returns another no-op logger", () => {
    const child = new NullLogger().child({ requestId: "r-1" })

    expect(child).toBeInstanceOf(NullLogger)
    expect(() => child.info("x")).not.toThrow()
  })
})
