import type { Milliseconds } from "@pagesim/clock"
import { type LogLevelName, logLevelNames } from "@pagesim/logger"
import { MAX_PAGE_COUNT, type ReplacementPolicy, replacementPolicies } from "@pagesim/paging"
import { z } from "zod/mini"

const count = z.pipe(z.coerce.number(), z.int().check(z.positive()))
const pageCount = z.pipe(z.coerce.number(), z.int().check(z.positive(), z.lte(MAX_PAGE_COUNT)))
const durationMs = z.coerce.number().check(z.positive())

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "Paging Simulator"),
  SERVER_HOST: z._default(z.string(), "0.0.0.0"),

  SERVER_PORT: z._default(z.coerce.number(), 5000),
  SERVER_SHUTDOWN_TIMEOUT_MS: z._default(durationMs, 10_000),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  REQUEST_ID_ENABLED: z._default(z.stringbool(), true),
  REQUEST_ID_HEADER: z._default(z.string(), "x-request-id"),

  REQUEST_LOGGING_ENABLED: z._default(z.stringbool(), true),
  REQUEST_LOGGING_LEVEL: z._default(z.enum(logLevelNames), "info"),

  MEMORY_FRAME_COUNT: z._default(count, 16),
  MEMORY_LOG_CAPACITY: z._default(count, 50),
  MEMORY_RECENT_LOG_LIMIT: z._default(count, 10),
  MEMORY_DEFAULT_POLICY: z._default(z.enum(replacementPolicies), "fifo"),

  PROCESS_MIN_PAGES: z._default(pageCount, 2),
  PROCESS_MAX_PAGES: z._default(pageCount, 4),

  LOCK_TIMEOUT_MS: z._default(durationMs, 1000),
  LOCK_POLL_MS: z._default(durationMs, 5),
  LOCK_TTL_MS: z._default(durationMs, 5000),
})

export type EnvConfig = z.infer<typeof envSchema>

/** Raw env-style values, as read from `.env` files or the process environment. */
export type EnvOverrides = Partial<Record<keyof EnvConfig, string>>

export type AppConfig = {
  app: {
    env: string
  }

  server: {
    host: string
    port: number
    shutdownTimeoutMs: Milliseconds
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  requestId: {
    enabled: boolean
    header: string
  }

  requestLogging: {
    enabled: boolean
    level: LogLevelName
  }

  memory: {
    frameCount: number
    logCapacity: number
    recentLogLimit: number
    defaultPolicy: ReplacementPolicy
    pageCounts: { min: number; max: number }
  }

  lock: {
    timeoutMs: Milliseconds
    pollMs: Milliseconds
    ttlMs: Milliseconds
  }
}
