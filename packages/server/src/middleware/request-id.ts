import type { Context } from "hono"
import type { Middleware } from "../server/server"
import type { EnabledRequestIdConfig } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"
import { setHeaderIfMissing } from "./utils/set-header-if-missing"

const MAX_INCOMING_LENGTH = 200

/** Context value, then a sane incoming header, then a fresh id. */
function resolveRequestId(c: Context, config: Required<EnabledRequestIdConfig>): string {
  const existing = c.get("requestId")
  if (isNonEmptyString(existing)) return existing

  const incoming = c.req.header(config.header)?.trim()
  if (isNonEmptyString(incoming) && incoming.length <= MAX_INCOMING_LENGTH) return incoming

  return config.generate()
}

/** Sets `requestId` on the context and echoes it on the response. */
export function requestIdMiddleware(config: Required<EnabledRequestIdConfig>): Middleware {
  return async (c, next) => {
    const requestId = resolveRequestId(c, config)
    c.set("requestId", requestId)

    await next()

    setHeaderIfMissing(c.res.headers, config.header, requestId)
  }
}
