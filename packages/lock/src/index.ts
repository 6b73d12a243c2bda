export { MemoryLease } from "./adapters/memory/memory-lock-lease"
export { MemoryLock, type MemoryLockDeps } from "./adapters/memory/memory-lock"
export { LockError, type LockErrorCode } from "./core/lock-error"
export {
  type PollOptions,
  type PollUntilResult,
  pollUntil,
} from "./core/polling/poll-until"
export { tryWithLock, withLock } from "./core/with-lock"
export type { Lock, LockKey } from "./ports/lock"
export type { LockLease } from "./ports/lock-lease"
export type { AcquireOptions, LockConfig, LockTtl, TryAcquireOptions } from "./ports/options"
