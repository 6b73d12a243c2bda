import type { LogLevelName } from "./log-level"

/**
 * Logger policy shared by every adapter.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local runs.
   * Leave off in production, where JSON lines are ingested.
   */
  prettify?: boolean
}
