import type { Milliseconds, TimeSource } from "@pagesim/clock"
import type { Logger } from "@pagesim/logger"
import type { LifecycleHook, PhaseResult } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export type StartupContext = {
  clock: TimeSource
  logger: Logger
  deadlineMs: Milliseconds
  startHooks: readonly LifecycleHook[]
}

export async function startup(ctx: StartupContext): Promise<PhaseResult> {
  ctx.logger.debug("Running startup hooks", { count: ctx.startHooks.length })

  const { failures, timedOut } = await runHooks(
    { phase: "startup", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    ctx.startHooks,
    { failFast: true },
  )

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type StartupFn = typeof startup
