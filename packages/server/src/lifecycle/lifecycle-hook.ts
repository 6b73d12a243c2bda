import type { Milliseconds } from "@pagesim/clock"

export interface LifecycleHookContext {
  /** Aborts when the phase deadline passes. */
  signal: AbortSignal
  timeRemainingMs: Milliseconds
}

/** Named async step run on start (fail fast) or stop (run them all). */
export interface LifecycleHook {
  name: string
  fn: (ctx: LifecycleHookContext) => Promise<void>
}

export interface HookFailure {
  hook: string
  error: unknown
}

export type PhaseResult = {
  ok: boolean
  failures: HookFailure[]
  timedOut: boolean
}
