import { serve } from "@hono/node-server"
import type { Logger } from "@pagesim/logger"
import type { Application } from "../server/server"
import type { ServerAddress } from "./create-stopper"
import type { Closeable } from "./shutdown"

export type Listening = {
  server: Closeable
  address: ServerAddress
}

/** Binds `app` and resolves once the socket accepts connections. */
export function listen(
  app: Application,
  bind: ServerAddress,
  logger: Logger,
): Promise<Listening> {
  return new Promise((resolve, reject) => {
    const server = serve({ fetch: app.fetch, port: bind.port, hostname: bind.host }, (info) => {
      server.off("error", reject)

      const address = { host: bind.host, port: info.port }
      logger.info(`Server listening on http://${address.host}:${address.port}`, address)

      resolve({ server, address })
    })

    server.once("error", reject)
  })
}

export type ListenFn = typeof listen
