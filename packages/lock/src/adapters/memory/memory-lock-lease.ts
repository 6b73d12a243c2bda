import { assertPositiveMs } from "../../core/lock-error"
import type { LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type { LockTtl } from "../../ports/options"

export class MemoryLease implements LockLease {
  private released = false
  private ttlTimer: NodeJS.Timeout | null = null

  constructor(
    readonly key: LockKey,
    private readonly onRelease: () => void,
    ttl: LockTtl,
  ) {
    this.arm(ttl)
  }

  get isReleased(): boolean {
    return this.released
  }

  async release(): Promise<void> {
    this.expire()
  }

  async extend(ttl: LockTtl): Promise<boolean> {
    if (this.released) return false

    this.arm(ttl)
    return true
  }

  private expire(): void {
    if (this.released) return

    this.released = true
    this.disarm()
    this.onRelease()
  }

  private arm(ttl: LockTtl): void {
    assertPositiveMs(ttl.milliseconds, "ttl")

    this.disarm()
    this.ttlTimer = setTimeout(() => this.expire(), ttl.milliseconds)
    // the watchdog must not keep the process alive
    this.ttlTimer.unref()
  }

  private disarm(): void {
    if (!this.ttlTimer) return

    clearTimeout(this.ttlTimer)
    this.ttlTimer = null
  }
}
