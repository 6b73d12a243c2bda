import { BaseError } from "@pagesim/errors"
import { z } from "zod"

export type ValidationIssue = { path: string; message: string }

/** `body.items[2].name` */
export function formatIssuePath(path: readonly PropertyKey[]): string {
  let out = ""

  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }

  return out
}

export class ValidationError extends BaseError<"validation_error"> {
  constructor(
    readonly issues: readonly ValidationIssue[],
    message = "Invalid input",
  ) {
    super(message, { code: "validation_error", context: { issues } })
  }

  static fromZodError(err: z.core.$ZodError): ValidationError {
    const issues = err.issues.map((issue) => ({
      path: formatIssuePath(issue.path),
      message: issue.message,
    }))

    const first = issues[0]
    if (!first) return new ValidationError(issues)

    const message = first.path ? `${first.path}: ${first.message}` : first.message
    return new ValidationError(issues, message)
  }
}

/** Parses with any Zod schema, classic or `zod/mini`. */
export function parseOrThrow<T>(schema: z.core.$ZodType<T>, data: unknown): T {
  const result = z.safeParse(schema, data)
  if (!result.success) throw ValidationError.fromZodError(result.error)

  return result.data
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError
}
