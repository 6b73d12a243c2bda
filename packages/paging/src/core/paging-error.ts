import { BaseError } from "@pagesim/errors"
import type { PageNumber, Pid } from "../ports/paging"
import type { AccessPageFailure, ProcessNotFound } from "../ports/results"

/** Largest page count a single process may have. */
export const MAX_PAGE_COUNT = 1024

export type PagingErrorCode =
  | "process_not_found"
  | "invalid_page"
  | "no_frames_available"
  | "invalid_page_count"
  | "invalid_configuration"

export class PagingError extends BaseError<PagingErrorCode> {
  static processNotFound(pid: Pid): PagingError {
    return new PagingError(`Process P${pid} not found`, {
      code: "process_not_found",
      context: { pid },
    })
  }

  static invalidPage(pid: Pid, pageNumber: PageNumber, pageCount: number): PagingError {
    return new PagingError(
      `Page ${pageNumber} is out of range for P${pid} (valid pages: 0-${pageCount - 1})`,
      {
        code: "invalid_page",
        context: { pid, pageNumber, pageCount },
      },
    )
  }

  static noFramesAvailable(pid: Pid, pageNumber: PageNumber): PagingError {
    return new PagingError(`No frame available for P${pid} page ${pageNumber}`, {
      code: "no_frames_available",
      context: { pid, pageNumber },
      isOperational: false,
    })
  }

  static invalidPageCount(value: unknown): PagingError {
    return new PagingError(
      `Page count must be an integer between 1 and ${MAX_PAGE_COUNT}, got: ${String(value)}`,
      {
        code: "invalid_page_count",
        context: { value, max: MAX_PAGE_COUNT },
      },
    )
  }

  static invalidConfiguration(option: string, value: unknown): PagingError {
    return new PagingError(`${option} must be a positive integer, got: ${String(value)}`, {
      code: "invalid_configuration",
      context: { option, value },
      isOperational: false,
    })
  }

  /** Error equivalent of a non-success result. */
  static fromResult(result: AccessPageFailure | ProcessNotFound): PagingError {
    switch (result.kind) {
      case "process_not_found":
        return PagingError.processNotFound(result.pid)
      case "invalid_page":
        return PagingError.invalidPage(result.pid, result.pageNumber, result.pageCount)
      case "no_frames_available":
        return PagingError.noFramesAvailable(result.pid, result.pageNumber)
    }
  }
}

export function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0
}

export function isValidPageCount(value: unknown): value is number {
  return isPositiveInteger(value) && value <= MAX_PAGE_COUNT
}
