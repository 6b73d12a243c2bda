import type { Clock } from "@pagesim/clock"
import { assertValidTimeMs } from "../../core/lock-error"
import { pollUntil } from "../../core/polling/poll-until"
import type { Lock, LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type { AcquireOptions, LockConfig, TryAcquireOptions } from "../../ports/options"
import { MemoryLease } from "./memory-lock-lease"

export type MemoryLockDeps = {
  clock: Clock
}

/** Process-local mutex keyed by string. */
export class MemoryLock implements Lock {
  private readonly held = new Map<LockKey, MemoryLease>()

  constructor(
    private readonly deps: MemoryLockDeps,
    private readonly config: LockConfig,
  ) {}

  isHeld(key: LockKey): boolean {
    return this.held.has(key)
  }

  async acquire(key: LockKey, opts: AcquireOptions): Promise<LockLease | null> {
    if (opts.signal?.aborted) return null

    const timeoutMs = opts.timeoutMs ?? this.config.defaultTimeoutMs
    assertValidTimeMs(timeoutMs, "timeoutMs")

    if (timeoutMs === 0) return this.tryAcquire(key, { ttl: opts.ttl })

    const acquired = await pollUntil(
      () => this.tryAcquire(key, { ttl: opts.ttl }),
      this.deps.clock,
      {
        pollMs: this.config.pollMs,
        timeoutMs,
        ...(opts.signal && { signal: opts.signal }),
      },
    )

    return acquired.ok ? acquired.value : null
  }

  async tryAcquire(key: LockKey, opts: TryAcquireOptions): Promise<LockLease | null> {
    if (this.held.has(key)) return null

    const lease = new MemoryLease(
      key,
      () => {
        if (this.held.get(key) === lease) this.held.delete(key)
      },
      opts.ttl,
    )

    this.held.set(key, lease)
    return lease
  }
}
