import { z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  /** Any Zod schema, classic or `zod/mini`. */
  schema: z.core.$ZodType<T>
  /** Applied in order, later wins. Defaults to the process environment. */
  sources?: ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = z.safeParse(schema, merged)

  if (!result.success) {
    throw ConfigError.invalid(
      z.prettifyError(result.error),
      sources.map((source) => source.name),
    )
  }

  return new Config<T>(
    result.data,
    provenance,
    new Set(Object.keys(merged)),
    sources.map((source) => source.name),
  )
}
