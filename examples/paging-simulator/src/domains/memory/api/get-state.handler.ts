import type { Context, RequestHandler } from "@pagesim/server"
import type { MemoryServices } from "../composition"

export function getStateHandler({ simulator }: MemoryServices): RequestHandler {
  return async (c: Context) => c.json(await simulator.state())
}
