import type { ServerHandle } from "@pagesim/server"
import { type AppContextOptions, createAppContext } from "../app/create-context"
import { buildServer } from "./build-server"

export async function run(options: AppContextOptions = {}): Promise<ServerHandle> {
  const ctx = await createAppContext(options)
  const { server } = buildServer(ctx)

  const running = await server.setupProcessHandlers().start()

  ctx.services.logger.info("Server started", {
    port: running.address.port,
    host: running.address.host,
  })

  return running
}
