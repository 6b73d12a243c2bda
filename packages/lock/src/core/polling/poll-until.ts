import type { Clock, Milliseconds } from "@pagesim/clock"
import { assertPositiveMs, assertValidTimeMs } from "../lock-error"

export type PollUntilResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: "timeout" | "aborted" }

export type PollOptions = {
  pollMs: Milliseconds
  timeoutMs: Milliseconds
  signal?: AbortSignal
}

/**
 * Calls `fn` until it yields a non-null value, sleeping `pollMs` on the
 * clock between attempts. Gives up once the clock passes the deadline.
 */
export async function pollUntil<T>(
  fn: () => Promise<T | null>,
  clock: Clock,
  opts: PollOptions,
): Promise<PollUntilResult<T>> {
  assertValidTimeMs(opts.timeoutMs, "timeoutMs")
  assertPositiveMs(opts.pollMs, "pollMs")

  const deadline = clock.nowMs() + opts.timeoutMs

  while (true) {
    if (opts.signal?.aborted) return { ok: false, reason: "aborted" }
    if (clock.nowMs() >= deadline) return { ok: false, reason: "timeout" }

    const result = await fn()
    if (result !== null) return { ok: true, value: result }

    await clock.sleep(opts.pollMs, opts.signal)
  }
}
