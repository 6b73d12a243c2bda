import { BaseError } from "@pagesim/errors"
import type { LockKey } from "../ports/lock"

export type LockErrorCode = "lock_timeout" | "lock_aborted" | "invalid_lock_option"

export class LockError extends BaseError<LockErrorCode> {
  static timeout(key: LockKey): LockError {
    return new LockError(`Timed out waiting for lock "${key}"`, {
      code: "lock_timeout",
      context: { key },
      isRetryable: true,
    })
  }

  static aborted(key: LockKey): LockError {
    return new LockError(`Lock acquisition for "${key}" was aborted`, {
      code: "lock_aborted",
      context: { key },
    })
  }

  static invalidOption(
    name: string,
    value: number,
    expected = "a finite, non-negative number",
  ): LockError {
    return new LockError(`${name} must be ${expected}, got: ${value}`, {
      code: "invalid_lock_option",
      context: { name, value },
      isOperational: false,
    })
  }
}

export function assertValidTimeMs(value: number, name: string): void {
  if (!Number.isFinite(value) || value < 0) throw LockError.invalidOption(name, value)
}

export function assertPositiveMs(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw LockError.invalidOption(name, value, "a finite, positive number")
  }
}
