import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/**
 * Manually driven clock for tests.
 *
 * `sleep()` never waits on a timer. It moves virtual time forward by the
 * requested amount and resolves, so code that polls against a deadline
 * still reaches it.
 */
export class FakeClock implements Clock {
  private time: Milliseconds

  constructor(start: Milliseconds | Date = 0) {
    this.time = start instanceof Date ? start.getTime() : start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): Milliseconds {
    this.time += ms
    return this.time
  }

  set(at: Milliseconds | Date): void {
    this.time = at instanceof Date ? at.getTime() : at
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.resolve()
    if (ms > 0) this.time += ms
    return Promise.resolve()
  }
}
