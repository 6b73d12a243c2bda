import type { Milliseconds, TimeSource } from "@pagesim/clock"
import type { Logger } from "@pagesim/logger"
import type { LifecycleHook, PhaseResult } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error | null) => void) => void
}

export type ShutdownContext = {
  server: Closeable
  clock: TimeSource
  logger: Logger
  deadlineMs: Milliseconds
  stopHooks: readonly LifecycleHook[]
}

/**
 * Closes the listener, then runs every stop hook even when earlier ones fail.
 *
 * @remarks
 * `timedOut` means the deadline passed before all steps ran. Open sockets are
 * not tracked, so a timed-out close may leave connections draining.
 */
export type StopResult = PhaseResult

export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  ctx.logger.warn("Shutting down gracefully")

  const { failures, timedOut } = await runHooks(
    { phase: "shutdown", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    [closeServerHook(ctx.server), ...ctx.stopHooks],
    { failFast: false },
  )

  ctx.logger.info("Shutdown complete", { failureCount: failures.length, timedOut })

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type ShutdownFn = typeof shutdown

function closeServerHook(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: ({ signal }) => closeUntilAborted(server, signal),
  }
}

/** Resolves when the server closes or the signal aborts, whichever is first. */
function closeUntilAborted(server: Closeable, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve()

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => resolve()
    signal.addEventListener("abort", onAbort, { once: true })

    server.close((err) => {
      signal.removeEventListener("abort", onAbort)

      if (err) reject(err)
      else resolve()
    })
  })
}
