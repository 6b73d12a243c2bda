import type { Logger } from "@pagesim/logger"
import type { ErrorHandler } from "../errors/create-error-handler"
import { registerHealthRoutes } from "../routes/health"
import type { Application, Middleware } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"

export interface BuildAppContext {
  app: Application
  options: ResolvedServerOptions
  logger: Logger
  isReady: () => boolean
  defaultMiddleware: Middleware[]
  errorHandler: ErrorHandler
}

/**
 * Order: default middleware, health routes, `pre` middleware, app routes,
 * `post` middleware. `pre` middleware does not run for health routes.
 */
export function buildApp(ctx: BuildAppContext): Application {
  const { app, options } = ctx

  use(app, ctx.defaultMiddleware)

  if (options.health.enabled) {
    registerHealthRoutes(app, options.health, ctx.isReady, ctx.logger)
  }

  use(app, options.middleware.pre)
  options.routes(app)
  use(app, options.middleware.post)

  app.onError(ctx.errorHandler)

  return app
}

export type BuildAppFn = typeof buildApp

function use(app: Application, middleware: readonly Middleware[]): void {
  for (const mw of middleware) app.use("*", mw)
}
