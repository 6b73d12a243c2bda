export {
  createErrorFormatter,
  DEFAULT_FALLBACK,
  type ErrorDetails,
  type ErrorHandler,
  type ErrorMapping,
  type ErrorMappingsConfig,
  type ErrorResponse,
  type ErrorResponseBody,
  formatIssuePath,
  isValidationError,
  parseOrThrow,
  ValidationError,
  type ValidationIssue,
} from "./errors"
export type { StatusCode } from "./http/status-codes"
export type { ServerAddress, ServerHandle } from "./lifecycle/create-stopper"
export type {
  HookFailure,
  LifecycleHook,
  LifecycleHookContext,
  PhaseResult,
} from "./lifecycle/lifecycle-hook"
export type { StopResult } from "./lifecycle/shutdown"
export {
  type ProcessEvents,
  type SignalHandler,
  type SignalHandlerContext,
  setupProcessHandlers,
} from "./lifecycle/signals"
export {
  type Application,
  type Context,
  createRouter,
  createServer,
  type Middleware,
  type RequestHandler,
  Server,
  type ServerCollaborators,
  ServerError,
  type ServerErrorCode,
  type ServerState,
} from "./server/server"
export type {
  HealthConfig,
  PathString,
  ReadinessCheck,
  RequestIdConfig,
  RequestLoggingConfig,
  ServerDependencies,
  ServerOptions,
} from "./server/server-options"
