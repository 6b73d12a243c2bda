import type { Logger } from "@pagesim/logger"
import type { StopResult } from "./shutdown"

/** The slice of `process` used to subscribe to signals and fatal errors. */
export type ProcessEvents = {
  on<A extends unknown[]>(event: string, listener: (...args: A) => void): unknown
  off<A extends unknown[]>(event: string, listener: (...args: A) => void): unknown
}

export interface SignalHandlerContext {
  logger: Logger
  stop?: () => Promise<StopResult>
  /** Hard exit if a fatal shutdown takes longer. @default 10_000 */
  fatalTimeoutMs?: number
  /** @default process.exit */
  exit?: (code: number) => void
  /** @default process */
  target?: ProcessEvents
}

export interface SignalHandler {
  unregister: () => void
}

/**
 * SIGINT and SIGTERM trigger one graceful stop. An uncaught exception or
 * unhandled rejection stops too, then exits with code 1.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? 10_000
  const exit = ctx.exit ?? ((code: number) => process.exit(code))
  const target: ProcessEvents = ctx.target ?? process
  let stopping = false

  const onSignal = (signal: NodeJS.Signals) => {
    ctx.logger.info("Received signal", { signal })
    if (stopping) return
    stopping = true

    ctx.logger.warn("Shutdown triggered", { reason: signal })
    void runStop(ctx, signal)
  }

  const onFatal = (reason: string, err: unknown) => {
    if (stopping) {
      ctx.logger.fatal("Fatal error during shutdown", { reason, err })
      exit(1)
      return
    }
    stopping = true

    ctx.logger.fatal("Fatal error", { reason, err })
    void stopThenExit(ctx, reason, fatalTimeoutMs, exit)
  }

  const sigint = () => onSignal("SIGINT")
  const sigterm = () => onSignal("SIGTERM")
  const uncaught = (err: Error) => onFatal("uncaughtException", err)
  const unhandled = (reason: unknown) => onFatal("unhandledRejection", reason)

  target.on("SIGINT", sigint)
  target.on("SIGTERM", sigterm)
  target.on("uncaughtException", uncaught)
  target.on("unhandledRejection", unhandled)

  return {
    unregister: () => {
      target.off("SIGINT", sigint)
      target.off("SIGTERM", sigterm)
      target.off("uncaughtException", uncaught)
      target.off("unhandledRejection", unhandled)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers

async function stopThenExit(
  ctx: SignalHandlerContext,
  reason: string,
  timeoutMs: number,
  exit: (code: number) => void,
): Promise<void> {
  const timer = setTimeout(() => {
    ctx.logger.fatal("Forced exit after timeout", { timeoutMs })
    exit(1)
  }, timeoutMs)
  timer.unref()

  try {
    await runStop(ctx, reason)
  } finally {
    clearTimeout(timer)
  }

  exit(1)
}

async function runStop(ctx: SignalHandlerContext, reason: string): Promise<void> {
  if (!ctx.stop) {
    ctx.logger.warn("No stop handler registered", { reason })
    return
  }

  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failures: result.failures.map((f) => f.hook),
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}
