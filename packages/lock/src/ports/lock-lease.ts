import type { LockKey } from "./lock"
import type { LockTtl } from "./options"

export interface LockLease {
  readonly key: LockKey

  /** Idempotent. */
  release(): Promise<void>

  /** Restart the TTL. `false` once the lease has been released or expired. */
  extend(ttl: LockTtl): Promise<boolean>
}
