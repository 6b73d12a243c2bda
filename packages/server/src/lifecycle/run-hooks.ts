import type { Milliseconds, TimeSource } from "@pagesim/clock"
import type { Logger } from "@pagesim/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  clock: TimeSource
  logger: Logger
  /** Epoch ms. */
  deadlineMs: Milliseconds
}

export type RunHooksPolicy = {
  /** Stop at the first failure. */
  failFast?: boolean
}

type HookOutcome = { failure?: HookFailure; timedOut: boolean }

/** Runs hooks in order. Stops early once the deadline passes, or at the first failure under `failFast`. */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: readonly LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<{ failures: HookFailure[]; timedOut: boolean }> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const outcome = await runHook(ctx, hook)

    if (outcome.failure) failures.push(outcome.failure)
    if (outcome.timedOut || (outcome.failure && policy.failFast)) {
      return { failures, timedOut: outcome.timedOut }
    }
  }

  return { failures, timedOut: false }
}

async function runHook(ctx: RunHooksContext, hook: LifecycleHook): Promise<HookOutcome> {
  const remaining = Math.max(0, ctx.deadlineMs - ctx.clock.nowMs())
  const label = ctx.phase === "startup" ? "Startup" : "Shutdown"

  if (remaining <= 0) {
    ctx.logger.warn(`Skipping remaining ${ctx.phase} hooks due to timeout`, { hook: hook.name })
    return { timedOut: true }
  }

  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), remaining)
  const expired = () => controller.signal.aborted || ctx.clock.nowMs() >= ctx.deadlineMs

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: remaining })
  } catch (error) {
    ctx.logger.error(`${label} hook failed: ${hook.name}`, { err: error })
    return { failure: { hook: hook.name, error }, timedOut: expired() }
  } finally {
    clearTimeout(timer)
  }

  if (expired()) {
    ctx.logger.warn(`${label} deadline exceeded during hook: ${hook.name}`)
    return { timedOut: true }
  }

  ctx.logger.info(`Executed ${ctx.phase} hook: ${hook.name}`)
  return { timedOut: false }
}
