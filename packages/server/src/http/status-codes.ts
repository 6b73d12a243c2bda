import type { ContentfulStatusCode } from "hono/utils/http-status"

/** Statuses that may carry a JSON body. */
export type StatusCode = ContentfulStatusCode
