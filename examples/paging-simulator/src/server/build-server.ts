import {
  type Application,
  createServer,
  isValidationError,
  type LifecycleHook,
  type Server,
} from "@pagesim/server"
import type { AppContext } from "../app/create-context"
import { createStartHooks, createStopHooks } from "../app/lifecycle"
import { memoryErrorMappings } from "../domains/memory/api"

export type BuiltServer = {
  app: Application
  server: Server
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

export function buildServer(ctx: AppContext): BuiltServer {
  const startHooks = createStartHooks(ctx)
  const stopHooks = createStopHooks(ctx)

  const server = createServer(
    {
      clock: ctx.services.clock,
      logger: ctx.services.logger,
    },
    {
      host: ctx.config.server.host,
      port: ctx.config.server.port,
      shutdownTimeoutMs: ctx.config.server.shutdownTimeoutMs,

      errorHandling: {
        kind: "mappings",
        config: {
          mappings: memoryErrorMappings,
          details: (error) => (isValidationError(error) ? { issues: error.issues } : undefined),
        },
      },

      requestId: ctx.config.requestId.enabled
        ? { enabled: true, header: ctx.config.requestId.header }
        : { enabled: false },

      requestLogging: ctx.config.requestLogging.enabled
        ? { enabled: true, level: ctx.config.requestLogging.level }
        : { enabled: false },

      routes: (app: Application): void => {
        ctx.registerRoutes(app, ctx.config, ctx.services)
      },

      startHooks,
      stopHooks,
    },
  )

  return {
    app: server.build(),
    server,
    startHooks,
    stopHooks,
  }
}
