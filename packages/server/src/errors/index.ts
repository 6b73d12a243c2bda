export { type CreateErrorHandlerFn, createErrorHandler, type ErrorHandler } from "./create-error-handler"
export {
  createErrorFormatter,
  DEFAULT_FALLBACK,
  type ErrorDetails,
  type ErrorFormatter,
  type ErrorMapping,
  type ErrorMappingsConfig,
  type ErrorResponse,
  type ErrorResponseBody,
  type FallbackMapping,
} from "./errors"
export {
  formatIssuePath,
  isValidationError,
  parseOrThrow,
  ValidationError,
  type ValidationIssue,
} from "./validation"
