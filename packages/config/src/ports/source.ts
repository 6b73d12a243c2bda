/**
 * A source of raw configuration values.
 *
 * Sources only load. Coercion and validation belong to the schema, and
 * sources are applied in order with later ones overriding earlier ones.
 */
export interface ConfigSource {
  /** Provenance label such as "env" or "dotenv:.env.production". */
  readonly name: string

  /** An `undefined` value means "not provided" and never overrides. */
  load(): Promise<Record<string, unknown>>
}
