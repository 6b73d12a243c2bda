import { BaseError } from "@pagesim/errors"
import { PagingError, isPositiveInteger } from "../paging-error"

describe("PagingError", () => {
  it("is a BaseError with a code and context", () => {
    const err = PagingError.processNotFound(7)

    expect(err).toBeInstanceOf(BaseError)
    expect(err).toBeInstanceOf(PagingError)
    expect(err.code).toBe("process_not_found")
    expect(err.message).toBe("Process P7 not found")
    expect(err.context).toEqual({ pid: 7 })
  })

  it("maps failure results to errors", () => {
    expect(PagingError.fromResult({ kind: "process_not_found", pid: 3 }).code).toBe(
      "process_not_found",
    )

    const invalid = PagingError.fromResult({
      kind: "invalid_page",
      pid: 1,
      pageNumber: 5,
      pageCount: 3,
    })
    expect(invalid.code).toBe("invalid_page")
    expect(invalid.message).toBe("Page 5 is out of range for P1 (valid pages: 0-2)")
    expect(invalid.context).toEqual({ pid: 1, pageNumber: 5, pageCount: 3 })

    const full = PagingError.fromResult({ kind: "no_frames_available", pid: 2, pageNumber: 0 })
    expect(full.code).toBe("no_frames_available")
    expect(full.isOperational).toBe(false)
  })

  it("marks configuration errors non-operational", () => {
    const err = PagingError.invalidConfiguration("frameCount", 0)

    expect(err.message).toBe("frameCount must be a positive integer, got: 0")
    expect(err.isOperational).toBe(false)
    expect(PagingError.invalidPageCount(0).isOperational).toBe(true)
  })

  it.each([
    [1, true],
    [16, true],
    [0, false],
    [-1, false],
    [1.5, false],
    [Number.NaN, false],
    ["3", false],
  ])("isPositiveInteger(%s) is %s", (value, expected) => {
    expect(isPositiveInteger(value)).toBe(expected)
  })
})
