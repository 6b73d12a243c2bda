export type LogContext = {
  requestId: string

  method: string
  path: string
  route: string

  status: number
  durationMs: number

  service: string
  module: string
  env: string

  pid: number
  pageNumber: number
  frameIndex: number
  policy: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/** Fields merged into a child logger's bindings. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
