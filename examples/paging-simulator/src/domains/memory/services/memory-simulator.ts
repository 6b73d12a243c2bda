import type { Milliseconds } from "@pagesim/clock"
import { type Lock, LockError, withLock } from "@pagesim/lock"
import type { Logger } from "@pagesim/logger"
import {
  type CreateProcessInput,
  type MemoryManager,
  type MemorySnapshot,
  type PageNumber,
  PagingError,
  type Pid,
  type ProcessDescriptor,
  type ProcessRemoved,
  type RandomSource,
  type ReplacementPolicy,
} from "@pagesim/paging"
import { SimulatorError } from "../model/simulator.errors"
import type { AccessOutcome } from "../model/simulator.model"

export const MEMORY_LOCK_KEY = "memory-manager"

export type MemorySimulatorDeps = {
  manager: MemoryManager
  lock: Lock
  random: RandomSource
  logger: Logger
}

export type MemorySimulatorOptions = {
  defaultPolicy: ReplacementPolicy
  lockTimeoutMs: Milliseconds
  lockTtlMs: Milliseconds
}

/**
 * Shares one memory manager between concurrent requests. Every call holds
 * the manager lock for its duration, and non-success results come back as
 * thrown `PagingError`s.
 */
export class MemorySimulator {
  private readonly logger: Logger

  constructor(
    private readonly deps: MemorySimulatorDeps,
    private readonly opts: MemorySimulatorOptions,
  ) {
    this.logger = deps.logger.child({ module: "memory-simulator" })
  }

  get defaultPolicy(): ReplacementPolicy {
    return this.opts.defaultPolicy
  }

  state(): Promise<MemorySnapshot> {
    return this.exclusive("state", () => this.deps.manager.snapshot())
  }

  createProcess(input: CreateProcessInput = {}): Promise<ProcessDescriptor> {
    return this.exclusive("createProcess", () => this.deps.manager.createProcess(input))
  }

  removeProcess(pid: Pid): Promise<ProcessRemoved> {
    return this.exclusive("removeProcess", () => {
      const result = this.deps.manager.removeProcess(pid)
      if (result.kind !== "removed") throw PagingError.fromResult(result)

      return result
    })
  }

  accessPage(
    pid: Pid,
    pageNumber: PageNumber,
    policy: ReplacementPolicy = this.opts.defaultPolicy,
  ): Promise<AccessOutcome> {
    return this.exclusive("accessPage", () => this.access(pid, pageNumber, policy))
  }

  /** Accesses a uniformly chosen page of a uniformly chosen process. */
  simulateAccess(policy: ReplacementPolicy = this.opts.defaultPolicy): Promise<AccessOutcome> {
    return this.exclusive("simulateAccess", () => {
      const { processes } = this.deps.manager.snapshot()

      const target = processes[this.pick(processes.length)]
      if (!target) throw SimulatorError.noProcesses()

      const pageNumber = this.pick(target.pageCount)
      this.logger.debug("Simulated access", { pid: target.pid, pageNumber, policy })

      return this.access(target.pid, pageNumber, policy)
    })
  }

  reset(): Promise<void> {
    return this.exclusive("reset", () => {
      this.deps.manager.reset()
      this.logger.info("Simulation reset")
    })
  }

  private access(pid: Pid, pageNumber: PageNumber, policy: ReplacementPolicy): AccessOutcome {
    const result = this.deps.manager.accessPage(pid, pageNumber, policy)

    switch (result.kind) {
      case "hit":
      case "fault":
        return result
      default:
        throw PagingError.fromResult(result)
    }
  }

  /** Index in `[0, size)`; 0 for an empty range. */
  private pick(size: number): number {
    if (size <= 0) return 0

    return Math.min(size - 1, Math.floor(this.deps.random.next() * size))
  }

  private async exclusive<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return await withLock(this.deps.lock, MEMORY_LOCK_KEY, fn, {
        ttl: { milliseconds: this.opts.lockTtlMs },
        timeoutMs: this.opts.lockTimeoutMs,
      })
    } catch (err) {
      if (err instanceof LockError && err.code === "lock_timeout") {
        this.logger.warn("Memory lock wait timed out", { operation })
        throw SimulatorError.simulatorBusy(operation, err)
      }

      throw err
    }
  }
}
