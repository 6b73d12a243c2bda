import type { Context, RequestHandler } from "@pagesim/server"
import type { MemoryServices } from "../composition"

export function resetHandler({ simulator }: MemoryServices): RequestHandler {
  return async (c: Context) => {
    await simulator.reset()

    return c.json({ success: true })
  }
}
