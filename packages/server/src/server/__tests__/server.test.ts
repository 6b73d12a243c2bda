import { FakeClock } from "@pagesim/clock"
import { BaseError } from "@pagesim/errors"
import { MemoryLogger } from "@pagesim/logger"
import type { Listening } from "../../lifecycle/listen"
import type { StopResult } from "../../lifecycle/shutdown"
import { createServer, type Middleware, type ServerCollaborators, ServerError } from "../server"
import type { ServerOptions } from "../server-options"
import { buildApp } from "../../lifecycle/build-app"
import { createErrorHandler } from "../../errors/create-error-handler"
import { createDefaultMiddleware } from "../../middleware/create-default-middleware"
import { createStopper } from "../../lifecycle/create-stopper"
import { shutdown } from "../../lifecycle/shutdown"
import { startup } from "../../lifecycle/startup"

describe("Server", () => {
  let clock: FakeClock
  let logger: MemoryLogger

  beforeEach(() => {
    clock = new FakeClock(0)
    logger = new MemoryLogger()
  })

  const baseOptions = (overrides: Partial<ServerOptions> = {}): ServerOptions => ({
    port: 0,
    host: "127.0.0.1",
    requestId: { enabled: true, generate: () => "req-fixed" },
    errorHandling: {
      kind: "mappings",
      config: { mappings: { test_missing: { status: 404 } } },
    },
    routes: (app) => {
      app.get("/things/:id", (c) => c.json({ id: c.req.param("id") }))
      app.get("/missing", () => {
        throw new BaseError("Nothing here", { code: "test_missing" })
      })
    },
    ...overrides,
  })

  /** Real lifecycle, but listening is faked so nothing binds a port. */
  function collaborators(close = vi.fn((cb?: (err?: Error | null) => void) => cb?.())) {
    const listen = vi.fn(
      async (): Promise<Listening> => ({
        server: { close },
        address: { host: "127.0.0.1", port: 4321 },
      }),
    )
    const setupProcessHandlers = vi.fn(() => ({ unregister: vi.fn() }))

    const collabs: ServerCollaborators = {
      onStartup: startup,
      onShutdown: shutdown,
      listen,
      buildApp,
      createStopper,
      setupProcessHandlers,
      createDefaultMiddleware,
      createErrorHandler,
    }

    return { collabs, listen, close, setupProcessHandlers }
  }

  describe("build", () => {
    it("serves routes with a request id header", async () => {
      const app = createServer({ logger, clock }, baseOptions()).build()

      const res = await app.request("/things/3")

      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({ id: "3" })
      expect(res.headers.get("x-request-id")).toBe("req-fixed")
    })

    it("formats errors through the mappings", async () => {
      const app = createServer({ logger, clock }, baseOptions()).build()

      const res = await app.request("/missing")

      expect(res.status).toBe(404)
      expect(await res.json()).toEqual({
        error: { code: "test_missing", status: 404, message: "Nothing here", requestId: "req-fixed" },
      })
    })

    it("returns the same app on every call", () => {
      const server = createServer({ logger, clock }, baseOptions())

      expect(server.build()).toBe(server.build())
    })

    it("reports not ready before start", async () => {
      const app = createServer({ logger, clock }, baseOptions()).build()

      expect((await app.request("/ready")).status).toBe(503)
      expect((await app.request("/health")).status).toBe(200)
    })

    it("runs pre middleware for routes but not for health", async () => {
      const seen: string[] = []
      const pre: Middleware = async (c, next) => {
        seen.push(c.req.path)
        await next()
      }
      const app = createServer({ logger, clock }, baseOptions({ middleware: { pre: [pre] } })).build()

      await app.request("/health")
      await app.request("/things/1")

      expect(seen).toEqual(["/things/1"])
    })

    it("does not log health checks", async () => {
      const app = createServer({ logger, clock }, baseOptions()).build()

      await app.request("/health")

      expect(logger.messages()).toEqual([])
    })
  })

  describe("start and stop", () => {
    it("becomes ready after start and not ready after stop", async () => {
      const { collabs, listen, close } = collaborators()
      const server = createServer({ logger, clock }, baseOptions(), collabs)

      const handle = await server.start()

      expect(listen).toHaveBeenCalledOnce()
      expect(handle.address).toEqual({ host: "127.0.0.1", port: 4321 })
      expect(server.getState()).toBe("started")
      expect(server.isReady()).toBe(true)
      expect((await server.build().request("/ready")).status).toBe(200)

      const result = await handle.stop()

      expect(result).toEqual({ ok: true, failures: [], timedOut: false })
      expect(close).toHaveBeenCalledOnce()
      expect(server.isReady()).toBe(false)
    })

    it("shares one shutdown between concurrent stops", async () => {
      const { collabs, close } = collaborators()
      const handle = await createServer({ logger, clock }, baseOptions(), collabs).start()

      const [a, b] = await Promise.all([handle.stop(), handle.stop()])

      expect(a).toBe(b)
      expect(close).toHaveBeenCalledOnce()
    })

    it("refuses a second start", async () => {
      const { collabs } = collaborators()
      const server = createServer({ logger, clock }, baseOptions(), collabs)
      await server.start()

      await expect(server.start()).rejects.toMatchObject({ code: "server_already_started" })
    })

    it("does not listen when a start hook fails", async () => {
      const { collabs, listen } = collaborators()
      const server = createServer(
        { logger, clock },
        baseOptions({
          startHooks: [
            {
              name: "warm-up",
              fn: async () => {
                throw new Error("cold")
              },
            },
          ],
        }),
        collabs,
      )

      const err = await server.start().catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ServerError)
      expect(err).toMatchObject({ code: "startup_failed", context: { failures: ["warm-up"] } })
      expect(listen).not.toHaveBeenCalled()
      expect(server.getState()).toBe("idle")
    })

    it("runs stop hooks after closing", async () => {
      const order: string[] = []
      const { collabs } = collaborators(
        vi.fn((cb?: (err?: Error | null) => void) => {
          order.push("close")
          cb?.()
        }),
      )
      const server = createServer(
        { logger, clock },
        baseOptions({ stopHooks: [{ name: "flush", fn: async () => void order.push("flush") }] }),
        collabs,
      )

      const handle = await server.start()
      await handle.stop()

      expect(order).toEqual(["close", "flush"])
    })
  })

  describe("setupProcessHandlers", () => {
    it("installs process handlers once", () => {
      const { collabs, setupProcessHandlers } = collaborators()
      const server = createServer({ logger, clock }, baseOptions(), collabs)

      server.setupProcessHandlers().setupProcessHandlers()

      expect(setupProcessHandlers).toHaveBeenCalledOnce()
    })

    it("stop before start is a no-op", async () => {
      let stop: (() => Promise<StopResult>) | undefined
      const { collabs } = collaborators()
      collabs.setupProcessHandlers = (ctx) => {
        stop = ctx.stop
        return { unregister: () => {} }
      }

      createServer({ logger, clock }, baseOptions(), collabs).setupProcessHandlers()

      await expect(stop?.()).resolves.toEqual({ ok: true, failures: [], timedOut: false })
      expect(logger.messages("warn")).toEqual(["Stop called but server not running"])
    })
  })
})
