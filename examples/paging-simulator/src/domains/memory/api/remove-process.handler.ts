import { parseOrThrow, type Context, type RequestHandler } from "@pagesim/server"
import type { MemoryServices } from "../composition"
import { processParamsSchema } from "./memory.api.schema"

export function removeProcessHandler({ simulator }: MemoryServices): RequestHandler {
  return async (c: Context) => {
    const { pid } = parseOrThrow(processParamsSchema, c.req.param())

    const { freedFrames } = await simulator.removeProcess(pid)

    return c.json({ success: true, pid, freedFrames })
  }
}
