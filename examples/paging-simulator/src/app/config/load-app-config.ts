import { type ConfigSource, DotenvSource, EnvSource, loadConfig, ObjectSource } from "@pagesim/config"
import { type AppConfig, type EnvConfig, type EnvOverrides, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
      shutdownTimeoutMs: env.SERVER_SHUTDOWN_TIMEOUT_MS,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    requestId: {
      enabled: env.REQUEST_ID_ENABLED,
      header: env.REQUEST_ID_HEADER,
    },
    requestLogging: {
      enabled: env.REQUEST_LOGGING_ENABLED,
      level: env.REQUEST_LOGGING_LEVEL,
    },
    memory: {
      frameCount: env.MEMORY_FRAME_COUNT,
      logCapacity: env.MEMORY_LOG_CAPACITY,
      recentLogLimit: env.MEMORY_RECENT_LOG_LIMIT,
      defaultPolicy: env.MEMORY_DEFAULT_POLICY,
      pageCounts: {
        min: env.PROCESS_MIN_PAGES,
        max: env.PROCESS_MAX_PAGES,
      },
    },
    lock: {
      timeoutMs: env.LOCK_TIMEOUT_MS,
      pollMs: env.LOCK_POLL_MS,
      ttlMs: env.LOCK_TTL_MS,
    },
  }
}

/**
 * `.env.{NODE_ENV}` (optional), then the process environment, then
 * `overrides`. Later sources win.
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  overrides?: EnvOverrides,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const nodeEnv = env.NODE_ENV ?? "development"

  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${nodeEnv}`, required: false, cwd }),
    new EnvSource({ env }),
  ]

  if (overrides) sources.push(new ObjectSource(overrides))

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value)
}
