import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("writes the message at the called level", () => {
      const { logger, read } = h.make()

      logger.fatal("frame pool exhausted")

      expect(read()).toEqual([
        expect.objectContaining({ level: "fatal", message: "frame pool exhausted" }),
      ])
    })

    it("child() inherits parent context and adds its own", () => {
      const { logger, read } = h.make()

      logger.child({ requestId: "req-1" }).child({ pid: 3 }).info("hit")

      expect(read()[0]?.payload).toMatchObject({ requestId: "req-1", pid: 3 })
    })

    it("child() wins on key conflict", () => {
      const { logger, read } = h.make()

      logger.child({ module: "paging" }).child({ module: "http" }).info("x")

      expect(read()[0]?.payload.module).toBe("http")
    })

    it("child() leaves the parent untouched", () => {
      const { logger, read } = h.make()
      const parent = logger.child({ requestId: "req-1" })

      parent.child({ pid: 1 })
      parent.info("parent")

      expect(read()[0]?.payload).not.toHaveProperty("pid")
    })

    it("per-call meta wins over bindings", () => {
      const { logger, read } = h.make()

      logger.child({ pageNumber: 1 }).info("x", { pageNumber: 2 })

      expect(read()[0]?.payload.pageNumber).toBe(2)
    })

    it("drops entries below the configured level", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.fatal("fatal")

      expect(read().map((l) => l.level)).toEqual(["warn", "fatal"])
    })
  })
}
