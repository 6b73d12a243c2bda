import type { Lock, LockKey } from "../ports/lock"
import type { AcquireOptions, TryAcquireOptions } from "../ports/options"
import { LockError } from "./lock-error"

/** Runs `fn` under `key` if the lock is free right now; `null` otherwise. */
export async function tryWithLock<T>(
  lock: Lock,
  key: LockKey,
  fn: () => Promise<T> | T,
  opts: TryAcquireOptions,
): Promise<T | null> {
  const lease = await lock.tryAcquire(key, opts)
  if (!lease) return null

  try {
    return await fn()
  } finally {
    await lease.release()
  }
}

/**
 * Runs `fn` while holding `key`, waiting for it if needed.
 *
 * @throws LockError `lock_aborted` when the signal fires first, `lock_timeout` when the wait runs out.
 */
export async function withLock<T>(
  lock: Lock,
  key: LockKey,
  fn: () => Promise<T> | T,
  opts: AcquireOptions,
): Promise<T> {
  if (opts.signal?.aborted) throw LockError.aborted(key)

  const lease = await lock.acquire(key, opts)
  if (!lease) throw opts.signal?.aborted ? LockError.aborted(key) : LockError.timeout(key)

  try {
    return await fn()
  } finally {
    await lease.release()
  }
}
