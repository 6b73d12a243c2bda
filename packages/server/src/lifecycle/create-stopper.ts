import type { Milliseconds, TimeSource } from "@pagesim/clock"
import type { Logger } from "@pagesim/logger"
import type { LifecycleHook } from "./lifecycle-hook"
import type { Closeable, ShutdownFn, StopResult } from "./shutdown"

export type ServerAddress = { host: string; port: number }

export interface ServerHandle {
  /** Idempotent: every call returns the same shutdown. */
  stop(): Promise<StopResult>
  address: ServerAddress
}

export interface StopperContext {
  server: Closeable
  address: ServerAddress
  clock: TimeSource
  logger: Logger
  shutdownTimeoutMs: Milliseconds
  stopHooks: readonly LifecycleHook[]
  shutdown: ShutdownFn

  /** Flips readiness off before anything closes. */
  setReady: (value: boolean) => void
  onStop: () => void
}

export function createStopper(ctx: StopperContext): ServerHandle {
  let stopping: Promise<StopResult> | undefined

  return {
    stop: () => {
      stopping ??= runShutdown(ctx)
      return stopping
    },
    address: ctx.address,
  }
}

export type CreateStopperFn = typeof createStopper

async function runShutdown(ctx: StopperContext): Promise<StopResult> {
  ctx.setReady(false)

  try {
    return await ctx.shutdown({
      server: ctx.server,
      clock: ctx.clock,
      logger: ctx.logger,
      deadlineMs: ctx.clock.nowMs() + ctx.shutdownTimeoutMs,
      stopHooks: ctx.stopHooks,
    })
  } finally {
    ctx.onStop()
  }
}
