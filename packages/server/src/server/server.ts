import { BaseError } from "@pagesim/errors"
import { type Handler, Hono, type Context as HonoContext, type MiddlewareHandler } from "hono"
import { type CreateErrorHandlerFn, createErrorHandler } from "../errors/create-error-handler"
import { type BuildAppFn, buildApp } from "../lifecycle/build-app"
import { type CreateStopperFn, createStopper, type ServerHandle } from "../lifecycle/create-stopper"
import { type ListenFn, listen } from "../lifecycle/listen"
import { type ShutdownFn, type StopResult, shutdown } from "../lifecycle/shutdown"
import {
  type SetupProcessHandlersFn,
  type SignalHandler,
  setupProcessHandlers,
} from "../lifecycle/signals"
import { type StartupFn, startup } from "../lifecycle/startup"
import {
  type CreateDefaultMiddlewareFn,
  createDefaultMiddleware,
} from "../middleware/create-default-middleware"
import {
  type ResolvedServerOptions,
  resolveOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"

export type Application = Hono
export type Router = Hono
export type Context = HonoContext
export type Middleware = MiddlewareHandler
export type RequestHandler = Handler
export type ServerState = "idle" | "starting" | "started"

export interface ServerCollaborators {
  onStartup: StartupFn
  onShutdown: ShutdownFn
  listen: ListenFn
  buildApp: BuildAppFn
  createStopper: CreateStopperFn
  setupProcessHandlers: SetupProcessHandlersFn
  createDefaultMiddleware: CreateDefaultMiddlewareFn
  createErrorHandler: CreateErrorHandlerFn
}

const defaultCollaborators: ServerCollaborators = {
  onStartup: startup,
  onShutdown: shutdown,
  listen,
  buildApp,
  createStopper,
  setupProcessHandlers,
  createDefaultMiddleware,
  createErrorHandler,
}

export type ServerErrorCode = "server_already_started" | "startup_failed"

export class ServerError extends BaseError<ServerErrorCode> {}

export function createRouter(): Router {
  return new Hono()
}

export class Server {
  private state: ServerState = "idle"
  private ready = false
  private app: Application | undefined
  private handle: ServerHandle | undefined
  private signalHandler: SignalHandler | undefined

  constructor(
    private readonly deps: ServerDependencies,
    private readonly options: ResolvedServerOptions,
    private readonly collabs: ServerCollaborators = defaultCollaborators,
  ) {}

  /**
   * The fully wired application: middleware, health routes, app routes and
   * error handler. Built once; `start` serves this same instance.
   */
  build(): Application {
    this.app ??= this.collabs.buildApp({
      app: new Hono(),
      options: this.options,
      logger: this.deps.logger,
      isReady: () => this.ready,
      defaultMiddleware: this.collabs.createDefaultMiddleware(this.options, this.deps),
      errorHandler: this.collabs.createErrorHandler(this.options.errorHandling, this.deps.logger),
    })

    return this.app
  }

  setupProcessHandlers(): this {
    if (this.signalHandler) return this

    this.signalHandler = this.collabs.setupProcessHandlers({
      logger: this.deps.logger,
      stop: () => this.handle?.stop() ?? this.noopStop(),
    })

    return this
  }

  async start(): Promise<ServerHandle> {
    if (this.state !== "idle") {
      throw new ServerError("Server already started", { code: "server_already_started" })
    }

    this.state = "starting"

    try {
      const started = await this.collabs.onStartup({
        clock: this.deps.clock,
        logger: this.deps.logger,
        deadlineMs: this.deps.clock.nowMs() + this.options.startupTimeoutMs,
        startHooks: this.options.startHooks,
      })

      if (!started.ok) {
        throw new ServerError("Startup hooks did not complete", {
          code: "startup_failed",
          context: { failures: started.failures.map((f) => f.hook), timedOut: started.timedOut },
          cause: started.failures[0]?.error,
          isOperational: false,
        })
      }

      const { server, address } = await this.collabs.listen(
        this.build(),
        { host: this.options.host, port: this.options.port },
        this.deps.logger,
      )

      const handle = this.collabs.createStopper({
        server,
        address,
        clock: this.deps.clock,
        logger: this.deps.logger,
        shutdownTimeoutMs: this.options.shutdownTimeoutMs,
        stopHooks: this.options.stopHooks,
        shutdown: this.collabs.onShutdown,
        setReady: (value) => {
          this.ready = value
        },
        onStop: () => this.signalHandler?.unregister(),
      })

      this.handle = handle
      this.ready = true
      this.state = "started"

      return handle
    } catch (err) {
      this.state = "idle"
      this.ready = false

      throw err
    }
  }

  getState(): ServerState {
    return this.state
  }

  isReady(): boolean {
    return this.ready
  }

  private noopStop(): Promise<StopResult> {
    this.deps.logger.warn("Stop called but server not running")

    return Promise.resolve({ ok: true, failures: [], timedOut: false })
  }
}

export function createServer(
  deps: ServerDependencies,
  options: ServerOptions,
  collabs?: ServerCollaborators,
): Server {
  return new Server(deps, resolveOptions(options), collabs)
}
