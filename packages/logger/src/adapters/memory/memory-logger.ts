import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { LogLevels, type LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type MemoryLogEntry = {
  level: LogLevelName
  message: string
  fields: Record<string, unknown>
}

const severity: Record<LogLevelName, number> = {
  trace: LogLevels.Trace,
  debug: LogLevels.Debug,
  info: LogLevels.Info,
  warn: LogLevels.Warn,
  error: LogLevels.Error,
  fatal: LogLevels.Fatal,
}

/**
 * Keeps entries in an array shared by the logger and all of its children.
 * Intended for tests that assert on what was logged.
 */
export class MemoryLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  constructor(
    private readonly opts: Partial<LoggerOptions> = {},
    private readonly bindings: LogContextPatch = {},
    private readonly sink: MemoryLogEntry[] = [],
  ) {}

  get entries(): readonly MemoryLogEntry[] {
    return this.sink
  }

  messages(level?: LogLevelName): string[] {
    return this.sink.filter((e) => level === undefined || e.level === level).map((e) => e.message)
  }

  clear(): void {
    this.sink.length = 0
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new MemoryLogger<TContext & U>(this.opts, { ...this.bindings, ...context }, this.sink)
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    if (severity[level] < severity[this.opts.level ?? "trace"]) return

    this.sink.push({ level, message, fields: { ...this.bindings, ...meta } })
  }
}
