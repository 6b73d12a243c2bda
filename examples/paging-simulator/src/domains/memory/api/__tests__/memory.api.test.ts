import type { Application } from "@pagesim/server"
import { createTestHarness, type TestHarness } from "../../../../tests/test-harness"

describe("Memory API", () => {
  let harness: TestHarness
  let app: Application

  beforeEach(async () => {
    harness = await createTestHarness({ configOverrides: { MEMORY_FRAME_COUNT: "2" } })
    app = harness.app
  })

  type ApiResponse = {
    status: number
    headers: Headers
    body: unknown
  }

  const parseBody = async (res: Response): Promise<unknown> => {
    if (res.headers.get("content-type")?.includes("application/json")) return res.json()

    return res.text()
  }

  const send = async (method: string, path: string, body?: unknown): Promise<ApiResponse> => {
    const res = await app.request(`/api/v1${path}`, {
      method,
      headers: { "Content-Type": "application/json" },
      ...(body !== undefined && { body: typeof body === "string" ? body : JSON.stringify(body) }),
    })

    return { status: res.status, headers: res.headers, body: await parseBody(res) }
  }

  const createProcess = (body?: unknown) => send("POST", "/processes", body)
  const access = (pid: number | string, page: number | string, body?: unknown) =>
    send("POST", `/processes/${pid}/pages/${page}/access`, body)

  describe("GET /", () => {
    it("greets with the service name", async () => {
      const res = await app.request("/")

      expect(res.status).toBe(200)
      expect(await res.text()).toBe("Welcome to Paging Simulator API")
    })
  })

  describe("health", () => {
    it("reports liveness", async () => {
      const res = await app.request("/health")

      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({ ok: true })
    })

    it("is not ready before the server has started", async () => {
      const res = await app.request("/ready")

      expect(res.status).toBe(503)
      expect(await res.json()).toEqual({ ok: false, reason: "starting" })
    })
  })

  describe("GET /state", () => {
    it("returns an empty simulation", async () => {
      const { status, body } = await send("GET", "/state")

      expect(status).toBe(200)
      expect(body).toEqual({
        frameCount: 2,
        frames: [null, null],
        processes: [],
        pageTable: [],
        evictionQueue: [],
        stats: { hits: 0, faults: 0, evictions: 0, hitRatio: 0 },
        recentLog: [],
      })
    })
  })

  describe("POST /processes", () => {
    it("creates a process sized from the random source when no body is sent", async () => {
      const { status, body } = await createProcess()

      expect(status).toBe(201)
      expect(body).toEqual({
        process: {
          pid: 1,
          pageCount: 2,
          pages: [
            { pageNumber: 0, frameIndex: null },
            { pageNumber: 1, frameIndex: null },
          ],
          color: "hsl(137, 70%, 60%)",
        },
      })
    })

    it("honours an explicit page count", async () => {
      const { status, body } = await createProcess({ pageCount: 3 })

      expect(status).toBe(201)
      expect(body).toMatchObject({ process: { pid: 1, pageCount: 3 } })
    })

    it("assigns sequential pids", async () => {
      await createProcess()
      const { body } = await createProcess()

      expect(body).toMatchObject({ process: { pid: 2, color: "hsl(274, 70%, 60%)" } })
    })

    it("rejects a page count below 1", async () => {
      const { status, body } = await createProcess({ pageCount: 0 })

      expect(status).toBe(422)
      expect(body).toEqual({
        error: {
          code: "validation_error",
          status: 422,
          message: "pageCount: Page count must be at least 1",
          requestId: expect.any(String),
          issues: [{ path: "pageCount", message: "Page count must be at least 1" }],
        },
      })
    })

    it("rejects a page count above the limit and keeps the state readable", async () => {
      const { status, body } = await createProcess({ pageCount: 2 ** 32 })

      expect(status).toBe(422)
      expect(body).toMatchObject({
        error: {
          code: "validation_error",
          message: "pageCount: Page count cannot exceed 1024",
        },
      })

      const state = await send("GET", "/state")
      expect(state).toMatchObject({ status: 200, body: { processes: [] } })
      expect((await createProcess()).body).toMatchObject({ process: { pid: 1 } })
    })

    it("rejects a body that is not JSON", async () => {
      const { status, body } = await createProcess("{")

      expect(status).toBe(422)
      expect(body).toMatchObject({
        error: { code: "validation_error", message: "Request body must be valid JSON" },
      })
    })
  })

  describe("POST /processes/:pid/pages/:page/access", () => {
    it("faults, hits and evicts across processes", async () => {
      await createProcess()

      expect((await access(1, 0)).body).toEqual({ success: true, hit: false, frameIndex: 0 })
      expect((await access(1, 1)).body).toEqual({ success: true, hit: false, frameIndex: 1 })
      expect((await access(1, 0)).body).toEqual({ success: true, hit: true, frameIndex: 0 })

      await createProcess({ pageCount: 1 })

      const evicting = await access(2, 0, { policy: "fifo" })
      expect(evicting).toMatchObject({
        status: 200,
        body: { success: true, hit: false, frameIndex: 0, evicted: { pid: 1, pageNumber: 0 } },
      })

      const { body: state } = await send("GET", "/state")
      expect(state).toMatchObject({
        frames: [
          { pid: 2, pageNumber: 0, color: "hsl(274, 70%, 60%)" },
          { pid: 1, pageNumber: 1, color: "hsl(137, 70%, 60%)" },
        ],
        evictionQueue: [1, 0],
        stats: { hits: 1, faults: 3, evictions: 1, hitRatio: 0.25 },
        recentLog: [
          { kind: "process_created", message: "Process P1 created (2 pages)" },
          { kind: "page_allocated", message: "Allocated P1 page 0 to frame 0" },
          { kind: "page_allocated", message: "Allocated P1 page 1 to frame 1" },
          { kind: "page_hit", message: "Page hit: P1 page 0" },
          { kind: "process_created", message: "Process P2 created (1 pages)" },
          { kind: "page_evicted", message: "Page fault: Evicting P1 page 0" },
          { kind: "page_allocated", message: "Allocated P2 page 0 to frame 0" },
        ],
      })
    })

    it("evicts the least recently used page under lru", async () => {
      await createProcess({ pageCount: 3 })
      await access(1, 0, { policy: "lru" })
      await access(1, 1, { policy: "lru" })
      await access(1, 0, { policy: "lru" })

      const { body } = await access(1, 2, { policy: "lru" })

      expect(body).toEqual({
        success: true,
        hit: false,
        frameIndex: 1,
        evicted: { pid: 1, pageNumber: 1 },
      })
    })

    it("evicts the oldest admitted page under the default policy", async () => {
      await createProcess({ pageCount: 3 })
      await access(1, 0)
      await access(1, 1)
      await access(1, 0)

      const { body } = await access(1, 2)

      expect(body).toEqual({
        success: true,
        hit: false,
        frameIndex: 0,
        evicted: { pid: 1, pageNumber: 0 },
      })
    })

    it("returns 404 for an unknown process", async () => {
      const { status, body } = await access(9, 0)

      expect(status).toBe(404)
      expect(body).toEqual({
        error: {
          code: "process_not_found",
          status: 404,
          message: "Process P9 not found",
          requestId: expect.any(String),
        },
      })
    })

    it("returns 422 for a page outside the process", async () => {
      await createProcess()

      const { status, body } = await access(1, 5)

      expect(status).toBe(422)
      expect(body).toMatchObject({
        error: {
          code: "invalid_page",
          message: "Page 5 is out of range for P1 (valid pages: 0-1)",
        },
      })
    })

    it("rejects a non-numeric page", async () => {
      await createProcess()

      const { status, body } = await access(1, "abc")

      expect(status).toBe(422)
      expect(body).toMatchObject({
        error: {
          code: "validation_error",
          message: "page: Page number must be a non-negative integer",
        },
      })
    })

    it("rejects an unknown policy", async () => {
      await createProcess()

      const { status, body } = await access(1, 0, { policy: "clock" })

      expect(status).toBe(422)
      expect(body).toMatchObject({
        error: { code: "validation_error", message: 'policy: Policy must be "fifo" or "lru"' },
      })
    })
  })

  describe("DELETE /processes/:pid", () => {
    it("frees the frames of the process", async () => {
      await createProcess()
      await access(1, 0)
      await access(1, 1)

      const { status, body } = await send("DELETE", "/processes/1")

      expect(status).toBe(200)
      expect(body).toEqual({ success: true, pid: 1, freedFrames: [0, 1] })
      expect((await send("GET", "/state")).body).toMatchObject({
        frames: [null, null],
        processes: [],
        evictionQueue: [],
      })
    })

    it("returns 404 for an unknown process", async () => {
      const { status, body } = await send("DELETE", "/processes/4")

      expect(status).toBe(404)
      expect(body).toMatchObject({ error: { code: "process_not_found" } })
    })
  })

  describe("POST /simulate", () => {
    it("returns 409 when there are no processes", async () => {
      const { status, body } = await send("POST", "/simulate")

      expect(status).toBe(409)
      expect(body).toMatchObject({
        error: {
          code: "no_processes",
          status: 409,
          message: "No processes to access; create one first",
        },
      })
    })

    it("accesses a randomly chosen page", async () => {
      await createProcess()

      const { status, body } = await send("POST", "/simulate", { policy: "lru" })

      expect(status).toBe(200)
      expect(body).toEqual({
        success: true,
        hit: false,
        pid: 1,
        pageNumber: 0,
        frameIndex: 0,
      })
    })
  })

  describe("POST /reset", () => {
    it("returns the simulator to its initial state", async () => {
      await createProcess()
      await access(1, 0)

      const { status, body } = await send("POST", "/reset")

      expect(status).toBe(200)
      expect(body).toEqual({ success: true })

      expect((await send("GET", "/state")).body).toMatchObject({
        frames: [null, null],
        processes: [],
        stats: { hits: 0, faults: 0, evictions: 0, hitRatio: 0 },
        recentLog: [],
      })
      expect((await createProcess()).body).toMatchObject({ process: { pid: 1 } })
    })
  })

  describe("request ids", () => {
    it("echoes the incoming id and puts it in error bodies", async () => {
      const res = await app.request("/api/v1/processes/9/pages/0/access", {
        method: "POST",
        headers: { "x-request-id": "req-123" },
      })

      expect(res.headers.get("x-request-id")).toBe("req-123")
      expect(await res.json()).toMatchObject({ error: { requestId: "req-123" } })
    })
  })

  describe("logging", () => {
    it("logs each completed request", async () => {
      await send("GET", "/state")

      expect(harness.logger.entries.find((e) => e.message === "Request completed")?.fields)
        .toMatchObject({ method: "GET", path: "/api/v1/state", status: 200 })
    })

    it("logs client errors at info", async () => {
      await access(9, 0)

      expect(harness.logger.entries.find((e) => e.message === "Request failed")).toMatchObject({
        level: "info",
        fields: { status: 404, code: "process_not_found" },
      })
    })
  })

  describe("lifecycle", () => {
    it("runs the start and stop hooks", async () => {
      await harness.lifecycle.start()
      await createProcess()
      await access(1, 0)
      await harness.lifecycle.stop()

      expect(harness.logger.entries.find((e) => e.message === "Memory simulator ready")?.fields)
        .toMatchObject({ frameCount: 2, policy: "fifo" })
      expect(harness.logger.entries.find((e) => e.message === "Final memory statistics")?.fields)
        .toMatchObject({ hits: 0, faults: 1, evictions: 0, hitRatio: 0 })
    })
  })
})
