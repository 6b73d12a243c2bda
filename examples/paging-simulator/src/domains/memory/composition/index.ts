import { MemoryLock } from "@pagesim/lock"
import {
  type MemoryManager,
  PagingMemoryManager,
  type RandomSource,
  randomPageCount,
  systemRandom,
} from "@pagesim/paging"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import { MemorySimulator } from "../services/memory-simulator"

export type MemoryServices = {
  manager: MemoryManager
  simulator: MemorySimulator
}

export type MemoryServiceOverrides = {
  /** Drives process sizes and simulated accesses. */
  random?: RandomSource
}

export function createMemoryServices(
  config: AppConfig,
  core: CoreServices,
  overrides: MemoryServiceOverrides = {},
): MemoryServices {
  const random = overrides.random ?? systemRandom

  const manager = new PagingMemoryManager(
    {
      clock: core.clock,
      logger: core.logger,
      pageCounts: randomPageCount(config.memory.pageCounts, random),
    },
    {
      frameCount: config.memory.frameCount,
      logCapacity: config.memory.logCapacity,
      recentLogLimit: config.memory.recentLogLimit,
    },
  )

  const lock = new MemoryLock(
    { clock: core.clock },
    { defaultTimeoutMs: config.lock.timeoutMs, pollMs: config.lock.pollMs },
  )

  const simulator = new MemorySimulator(
    { manager, lock, random, logger: core.logger },
    {
      defaultPolicy: config.memory.defaultPolicy,
      lockTimeoutMs: config.lock.timeoutMs,
      lockTtlMs: config.lock.ttlMs,
    },
  )

  return { manager, simulator }
}
