import { parseOrThrow, type Context, type RequestHandler } from "@pagesim/server"
import type { MemoryServices } from "../composition"
import { toAccessResponse } from "./access-response"
import { accessRequestSchema } from "./memory.api.schema"
import { readJsonBody } from "./read-json-body"

export function simulateAccessHandler({ simulator }: MemoryServices): RequestHandler {
  return async (c: Context) => {
    const { policy } = parseOrThrow(accessRequestSchema, await readJsonBody(c))

    const outcome = await simulator.simulateAccess(policy)

    return c.json(toAccessResponse(outcome))
  }
}
