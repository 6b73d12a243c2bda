import type { TimeSource } from "@pagesim/clock"
import type { Logger } from "@pagesim/logger"
import { routePath } from "hono/route"
import type { Middleware } from "../server/server"
import type { EnabledRequestLoggingConfig, PathString } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/** One line per completed request: 5xx at `error`, everything else at `config.level`. */
export function requestLoggingMiddleware(
  config: Required<EnabledRequestLoggingConfig>,
  deps: { logger: Logger; clock: TimeSource },
): Middleware {
  return async (c, next) => {
    const path = c.req.path
    if (isIgnored(path, config.ignorePaths)) return next()

    const startedAt = deps.clock.nowMs()

    try {
      await next()
    } finally {
      const method = c.req.method
      const matched = routePath(c)
      const route = isNonEmptyString(matched) && matched !== "/*" ? matched : path
      const status = c.res.status

      const meta = {
        method,
        path,
        route,
        op: `${method} ${route}`,
        status,
        durationMs: Math.max(0, deps.clock.nowMs() - startedAt),
      }

      const logger = c.get("logger") ?? deps.logger

      if (status >= 500) logger.error("Request completed", meta)
      else logger[config.level]("Request completed", meta)
    }
  }
}

function isIgnored(path: string, ignorePaths: readonly PathString[]): boolean {
  return ignorePaths.some((ignored) => path === ignored || path.startsWith(`${ignored}/`))
}
