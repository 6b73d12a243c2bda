import type { Milliseconds } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date.
   *
   * @remarks
   * Used for timestamps that leave the process. Arithmetic should use `nowMs()`.
   */
  now(): Date

  /** Current time as milliseconds since the Unix epoch. */
  nowMs(): Milliseconds
}

export interface Sleeper {
  /** Wait `ms` milliseconds. Resolves early once `signal` aborts. */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
