export { MemoryLogger, type MemoryLogEntry } from "./adapters/memory/memory-logger"
export { NullLogger, createNullLogger } from "./adapters/null/null-logger"
export { PinoLogger, createPinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export { LogLevels, isLogLevelName, logLevelNames } from "./ports/log-level"
export type { LogLevel, LogLevelName } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
