import type { Logger } from "@pagesim/logger"
import type { ErrorHandler as HonoErrorHandler } from "hono"
import { routePath } from "hono/route"
import { isNonEmptyString } from "../middleware/utils/is-non-empty-string"
import type { ErrorHandling } from "../server/server-options"
import { createErrorFormatter, type ErrorMappingsConfig, type ErrorResponseBody } from "./errors"

export type ErrorHandler = HonoErrorHandler

export function createErrorHandler(handling: ErrorHandling, logger: Logger): ErrorHandler {
  return handling.kind === "handler"
    ? handling.errorHandler
    : buildErrorHandler(handling.config, logger)
}

export type CreateErrorHandlerFn = typeof createErrorHandler

function buildErrorHandler(mappings: ErrorMappingsConfig, baseLogger: Logger): ErrorHandler {
  const format = createErrorFormatter(mappings)

  return (err, c) => {
    const requestId = c.get("requestId") ?? "unknown"
    const response = format(err, requestId)
    const matched = routePath(c)

    logFailure(c.get("logger") ?? baseLogger, err, {
      method: c.req.method,
      route: isNonEmptyString(matched) ? matched : c.req.path,
      ...response.error,
    })

    return c.json(response, response.error.status)
  }
}

type FailureMeta = ErrorResponseBody & {
  method: string
  route: string
}

/**
 * 5xx at `error` with the cause attached. 4xx at `info`, with the cause
 * repeated at `debug`.
 */
function logFailure(logger: Logger, err: unknown, meta: FailureMeta): void {
  const fields = {
    requestId: meta.requestId,
    method: meta.method,
    route: meta.route,
    status: meta.status,
    code: meta.code,
    op: `${meta.method} ${meta.route}`,
  }

  if (meta.status >= 500) {
    logger.error("Request failed", { ...fields, err })
    return
  }

  logger.info("Request failed", fields)
  logger.debug("Request failed details", { ...fields, err })
}
