export type ErrorCode = Lowercase<string>

/**
 * Structured metadata carried by an error (ids, offending inputs, limits).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, machine-readable code, e.g. `process_not_found`. */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the same call later might succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (unknown process, bad input),
   * `false` for invariant violations and programmer errors.
   *
   * @remarks
   * A non-operational error means the state it came from can no longer be
   * trusted; callers should log it as fatal rather than recover.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used in logs and HTTP error bodies.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
