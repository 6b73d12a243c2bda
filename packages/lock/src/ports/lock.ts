import type { LockLease } from "./lock-lease"
import type { AcquireOptions, TryAcquireOptions } from "./options"

export type LockKey = string

export interface Lock {
  /**
   * Acquire `key`, waiting up to `timeoutMs` while another holder has it.
   *
   * @returns The lease, or `null` when the wait timed out or was aborted.
   */
  acquire(key: LockKey, opts: AcquireOptions): Promise<LockLease | null>

  /** One attempt, no waiting. `null` when the key is held. */
  tryAcquire(key: LockKey, opts: TryAcquireOptions): Promise<LockLease | null>
}
