import { parseOrThrow, type Context, type RequestHandler } from "@pagesim/server"
import type { MemoryServices } from "../composition"
import { createProcessRequestSchema } from "./memory.api.schema"
import { readJsonBody } from "./read-json-body"

export function createProcessHandler({ simulator }: MemoryServices): RequestHandler {
  return async (c: Context) => {
    const { pageCount } = parseOrThrow(createProcessRequestSchema, await readJsonBody(c))

    const created = await simulator.createProcess(pageCount === undefined ? {} : { pageCount })

    return c.json({ process: created }, 201)
  }
}
