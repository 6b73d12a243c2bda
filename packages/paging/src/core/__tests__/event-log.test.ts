import { FakeClock } from "@pagesim/clock"
import { MemoryLogger } from "@pagesim/logger"
import { EventLog } from "../event-log"

describe("EventLog", () => {
  const at = new Date("2025-03-01T12:00:00.000Z")

  function setup(capacity = 50) {
    const clock = new FakeClock(at)
    const logger = new MemoryLogger()
    return { clock, logger, log: new EventLog({ clock, logger }, capacity) }
  }

  it("stamps entries with the clock", () => {
    const { clock, log } = setup()

    log.record("process_created", "Process P1 created (2 pages)")
    clock.advance(1500)
    log.record("page_hit", "Page hit: P1 page 0")

    expect(log.recent(10)).toEqual([
      { timestamp: at, kind: "process_created", message: "Process P1 created (2 pages)" },
      {
        timestamp: new Date(at.getTime() + 1500),
        kind: "page_hit",
        message: "Page hit: P1 page 0",
      },
    ])
  })

  it("drops the oldest entries past capacity", () => {
    const { log } = setup(50)

    for (let i = 1; i <= 60; i++) log.record("process_created", `Process P${i} created (2 pages)`)

    expect(log.size).toBe(50)
    expect(log.capacity).toBe(50)
    expect(log.recent(50)[0]?.message).toBe("Process P11 created (2 pages)")
    expect(log.recent(10).map((e) => e.message)).toEqual(
      Array.from({ length: 10 }, (_, i) => `Process P${51 + i} created (2 pages)`),
    )
  })

  it("writes lifecycle events at info and page traffic at debug", () => {
    const { log, logger } = setup()

    log.record("process_created", "created", { pid: 1 })
    log.record("page_allocated", "allocated", { pid: 1, pageNumber: 0, frameIndex: 0 })
    log.record("page_evicted", "evicted")
    log.record("process_terminated", "terminated")

    expect(logger.entries).toEqual([
      { level: "info", message: "created", fields: { pid: 1, event: "process_created" } },
      {
        level: "debug",
        message: "allocated",
        fields: { pid: 1, pageNumber: 0, frameIndex: 0, event: "page_allocated" },
      },
      { level: "debug", message: "evicted", fields: { event: "page_evicted" } },
      { level: "info", message: "terminated", fields: { event: "process_terminated" } },
    ])
  })

  it("hands out copies", () => {
    const { log } = setup()
    log.record("page_hit", "hit").timestamp.setTime(0)

    const [entry] = log.recent(1)
    entry?.timestamp.setTime(0)

    expect(log.recent(1)[0]?.timestamp).toEqual(at)
  })

  it("clears", () => {
    const { log } = setup()
    log.record("page_hit", "hit")

    log.clear()

    expect(log.size).toBe(0)
    expect(log.recent(10)).toEqual([])
  })
})
