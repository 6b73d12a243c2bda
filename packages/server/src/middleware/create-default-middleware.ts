import type { Middleware } from "../server/server"
import type { ResolvedServerOptions, ServerDependencies } from "../server/server-options"
import { requestIdMiddleware } from "./request-id"
import { requestLoggerMiddleware } from "./request-logger"
import { requestLoggingMiddleware } from "./request-logging"

export function createDefaultMiddleware(
  options: ResolvedServerOptions,
  deps: ServerDependencies,
): Middleware[] {
  const middleware: Middleware[] = []

  if (options.requestId.enabled) middleware.push(requestIdMiddleware(options.requestId))

  middleware.push(requestLoggerMiddleware(deps.logger))

  if (options.requestLogging.enabled) {
    middleware.push(requestLoggingMiddleware(options.requestLogging, deps))
  }

  return middleware
}

export type CreateDefaultMiddlewareFn = typeof createDefaultMiddleware
