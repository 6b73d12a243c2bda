import type { Milliseconds } from "@pagesim/clock"
import type { Logger } from "@pagesim/logger"
import type { Application } from "../server/server"
import type { ReadinessCheck, ResolvedHealthConfig } from "../server/server-options"

const NO_CACHE = { "Cache-Control": "no-store, no-cache, must-revalidate" } as const

type CheckOutcome = { ok: true } | { ok: false; reason: string }

export function registerHealthRoutes(
  app: Application,
  config: ResolvedHealthConfig,
  isReady: () => boolean,
  logger: Logger,
): void {
  if (!config.enabled) return

  app.get(config.livenessPath, (c) => c.json({ ok: true }, 200, NO_CACHE))

  app.get(config.readinessPath, async (c) => {
    if (!isReady()) return c.json({ ok: false, reason: "starting" }, 503, NO_CACHE)

    for (const check of config.readinessChecks) {
      const outcome = await runCheck(check, check.timeoutMs ?? config.checkTimeoutMs, logger)
      if (!outcome.ok) return c.json({ ok: false, reason: outcome.reason }, 503, NO_CACHE)
    }

    return c.json({ ok: true }, 200, NO_CACHE)
  })
}

async function runCheck(
  check: ReadinessCheck,
  timeoutMs: Milliseconds,
  logger: Logger,
): Promise<CheckOutcome> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), timeoutMs)

  try {
    const healthy = await check.fn(controller.signal)

    if (controller.signal.aborted) return { ok: false, reason: `${check.name}:timeout` }
    return healthy ? { ok: true } : { ok: false, reason: check.name }
  } catch (err) {
    if (controller.signal.aborted) return { ok: false, reason: `${check.name}:timeout` }

    logger.warn("Readiness check threw", { check: check.name, err })
    return { ok: false, reason: `${check.name}:error` }
  } finally {
    clearTimeout(timer)
  }
}
