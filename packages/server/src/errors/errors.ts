import { type AppError, type ErrorCode, isAppError } from "@pagesim/errors"
import type { StatusCode } from "../http/status-codes"

export type ErrorMapping = {
  status: StatusCode

  /**
   * Client-facing message. When omitted the error's own message is sent,
   * so only omit it for errors whose messages are written for clients.
   */
  message?: string
}

export type FallbackMapping = {
  code: ErrorCode
  status: StatusCode
  message: string
}

/** Extra fields merged into the error body; `undefined` adds nothing. */
export type ErrorDetails = (error: AppError) => Record<string, unknown> | undefined

export interface ErrorMappingsConfig {
  /** Unmapped AppErrors keep their code but take the fallback status and message. */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>

  /** Used for unmapped and non-AppError errors. */
  fallback?: FallbackMapping

  details?: ErrorDetails
}

export type ErrorResponseBody = {
  code: ErrorCode
  status: StatusCode
  message: string
  requestId: string
  [key: string]: unknown
}

export type ErrorResponse = {
  error: ErrorResponseBody
}

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

export const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
}

export function createErrorFormatter(config: ErrorMappingsConfig): ErrorFormatter {
  const fallback = config.fallback ?? DEFAULT_FALLBACK

  return (error, requestId) => {
    if (!isAppError(error)) {
      return { error: { ...fallback, requestId } }
    }

    const mapping = config.mappings[error.code]
    const details = config.details?.(error)

    return {
      error: {
        ...details,
        code: error.code,
        status: mapping?.status ?? fallback.status,
        message: mapping ? (mapping.message ?? error.message) : fallback.message,
        requestId,
      },
    }
  }
}
