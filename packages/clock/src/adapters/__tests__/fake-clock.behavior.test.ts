import { FakeClock } from "../fake-clock"

describe("FakeClock behavior", () => {
  it("starts at zero by default", () => {
    expect(new FakeClock().nowMs()).toBe(0)
  })

  it("accepts a Date as the starting instant", () => {
    const clock = new FakeClock(new Date("2025-01-01T00:00:00.000Z"))

    expect(clock.now().toISOString()).toBe("2025-01-01T00:00:00.000Z")
  })

  it("advance() moves forward and returns the new time", () => {
    const clock = new FakeClock(1_000)

    expect(clock.advance(250)).toBe(1_250)
    expect(clock.nowMs()).toBe(1_250)
  })

  it("set() jumps to an exact instant", () => {
    const clock = new FakeClock(1_000)

    clock.set(50)

    expect(clock.nowMs()).toBe(50)
  })

  it("sleep() advances virtual time by the requested amount", async () => {
    const clock = new FakeClock(0)

    await clock.sleep(40)
    await clock.sleep(2)

    expect(clock.nowMs()).toBe(42)
  })

  it("sleep() leaves time alone when the signal is aborted", async () => {
    const clock = new FakeClock(0)
    const ac = new AbortController()
    ac.abort()

    await clock.sleep(1_000, ac.signal)

    expect(clock.nowMs()).toBe(0)
  })
})
