/**
 * Validated configuration with provenance.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ MEMORY_FRAME_COUNT: z._default(z.coerce.number(), 16) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("MEMORY_FRAME_COUNT")     // 16
 * config.explain("MEMORY_FRAME_COUNT") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object. */
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that supplied the final value for `key`,
   * or "default" when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Sources that contributed at least one value, in first-use order. */
  sourcesUsed(): string[]

  /**
   * Keys present in the sources that the schema does not know.
   * Usually typos or stale settings.
   */
  unknownKeys(): string[]
}
