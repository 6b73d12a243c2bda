import type { Milliseconds } from "@pagesim/clock"

export type LockTtl = { milliseconds: Milliseconds }

export type AcquireOptions = {
  /** How long the lease lives before it expires on its own. */
  ttl: LockTtl

  /** Max wait. Falls back to `LockConfig.defaultTimeoutMs`. */
  timeoutMs?: Milliseconds

  /** Aborts the wait. Has no effect once the lease is held. */
  signal?: AbortSignal
}

export type TryAcquireOptions = {
  ttl: LockTtl
}

export type LockConfig = {
  defaultTimeoutMs: Milliseconds
  /** Interval between attempts while waiting. */
  pollMs: Milliseconds
}
