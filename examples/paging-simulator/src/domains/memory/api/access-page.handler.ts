import { parseOrThrow, type Context, type RequestHandler } from "@pagesim/server"
import type { MemoryServices } from "../composition"
import { toAccessResponse } from "./access-response"
import { accessRequestSchema, pageParamsSchema } from "./memory.api.schema"
import { readJsonBody } from "./read-json-body"

export function accessPageHandler({ simulator }: MemoryServices): RequestHandler {
  return async (c: Context) => {
    const { pid, page } = parseOrThrow(pageParamsSchema, c.req.param())
    const { policy } = parseOrThrow(accessRequestSchema, await readJsonBody(c))

    const outcome = await simulator.accessPage(pid, page, policy)
    const { hit, frameIndex, evicted } = toAccessResponse(outcome)

    return c.json({ success: true, hit, frameIndex, ...(evicted && { evicted }) })
  }
}
