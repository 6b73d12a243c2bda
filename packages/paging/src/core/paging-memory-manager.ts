import type { TimeSource } from "@pagesim/clock"
import type { Logger } from "@pagesim/logger"
import type { MemoryManager } from "../ports/memory-manager"
import type { PageCountSource } from "../ports/page-count-source"
import type { FrameIndex, PageNumber, PageRef, Pid, Tick } from "../ports/paging"
import type { CreateProcessInput, ProcessDescriptor } from "../ports/process"
import type { ReplacementPolicy } from "../ports/replacement-policy"
import type { AccessPageResult, PageFault, RemoveProcessResult } from "../ports/results"
import type { MemorySnapshot, MemoryStats } from "../ports/snapshot"
import type { VictimSelector } from "../ports/victim-selector"
import { EventLog } from "./event-log"
import { EvictionQueue } from "./eviction-queue"
import { FramePool } from "./frame-pool"
import { PageTable } from "./page-table"
import { PagingError, isPositiveInteger, isValidPageCount } from "./paging-error"
import { processColor } from "./process-color"
import { victimSelectors } from "./victim-selectors"

export const DEFAULT_FRAME_COUNT = 16
export const DEFAULT_LOG_CAPACITY = 50
export const DEFAULT_RECENT_LOG_LIMIT = 10

export type PagingMemoryManagerDeps = {
  clock: TimeSource
  logger: Logger
  pageCounts: PageCountSource
  /** Per-policy victim choice. Defaults to the FIFO and LRU selectors. */
  victimSelectors?: Readonly<Record<ReplacementPolicy, VictimSelector>>
}

export type PagingMemoryManagerOptions = {
  frameCount?: number
  /** Event log capacity. */
  logCapacity?: number
  /** Entries included in `snapshot().recentLog`. */
  recentLogLimit?: number
}

type ProcessRecord = {
  pid: Pid
  pageCount: number
  color: string
}

type Counters = Omit<MemoryStats, "hitRatio">

const zeroCounters = (): Counters => ({ hits: 0, faults: 0, evictions: 0 })

export class PagingMemoryManager implements MemoryManager {
  readonly frameCount: number

  private readonly recentLogLimit: number
  private readonly logger: Logger
  private readonly pageCounts: PageCountSource
  private readonly selectors: Readonly<Record<ReplacementPolicy, VictimSelector>>

  private readonly frames: FramePool
  private readonly pageTable = new PageTable()
  private readonly queue = new EvictionQueue()
  private readonly processes = new Map<Pid, ProcessRecord>()
  private readonly log: EventLog

  private counters = zeroCounters()
  private nextPid: Pid = 1
  private tick: Tick = 0

  constructor(deps: PagingMemoryManagerDeps, opts: PagingMemoryManagerOptions = {}) {
    const frameCount = opts.frameCount ?? DEFAULT_FRAME_COUNT
    const logCapacity = opts.logCapacity ?? DEFAULT_LOG_CAPACITY
    const recentLogLimit = opts.recentLogLimit ?? DEFAULT_RECENT_LOG_LIMIT

    if (!isPositiveInteger(frameCount)) {
      throw PagingError.invalidConfiguration("frameCount", frameCount)
    }
    if (!isPositiveInteger(logCapacity)) {
      throw PagingError.invalidConfiguration("logCapacity", logCapacity)
    }
    if (!isPositiveInteger(recentLogLimit)) {
      throw PagingError.invalidConfiguration("recentLogLimit", recentLogLimit)
    }

    this.frameCount = frameCount
    this.recentLogLimit = recentLogLimit
    this.pageCounts = deps.pageCounts
    this.selectors = deps.victimSelectors ?? victimSelectors
    this.logger = deps.logger.child({ module: "paging" })
    this.frames = new FramePool(frameCount)
    this.log = new EventLog({ clock: deps.clock, logger: this.logger }, logCapacity)
  }

  createProcess(input: CreateProcessInput = {}): ProcessDescriptor {
    const pageCount = input.pageCount ?? this.pageCounts.next()
    if (!isValidPageCount(pageCount)) throw PagingError.invalidPageCount(pageCount)

    const pid = this.nextPid++
    const process: ProcessRecord = { pid, pageCount, color: processColor(pid) }

    this.processes.set(pid, process)
    this.log.record("process_created", `Process P${pid} created (${pageCount} pages)`, { pid })

    return this.describe(process)
  }

  accessPage(pid: Pid, pageNumber: PageNumber, policy: ReplacementPolicy): AccessPageResult {
    const process = this.processes.get(pid)
    if (!process) return { kind: "process_not_found", pid }

    if (!Number.isInteger(pageNumber) || pageNumber < 0 || pageNumber >= process.pageCount) {
      return { kind: "invalid_page", pid, pageNumber, pageCount: process.pageCount }
    }

    const now = this.tick + 1
    const hit = this.pageTable.touch(pid, pageNumber, now)

    if (hit) {
      this.tick = now
      this.counters.hits++
      this.log.record("page_hit", `Page hit: P${pid} page ${pageNumber}`, {
        pid,
        pageNumber,
        frameIndex: hit.frameIndex,
      })
      return { kind: "hit", pid, pageNumber, frameIndex: hit.frameIndex }
    }

    return this.fault({ pid, pageNumber }, policy, now)
  }

  removeProcess(pid: Pid): RemoveProcessResult {
    if (!this.processes.has(pid)) return { kind: "process_not_found", pid }

    const freedFrames = this.frames.framesOwnedBy(pid)

    for (const frameIndex of freedFrames) {
      this.frames.release(frameIndex)
      this.queue.remove(frameIndex)
    }
    this.pageTable.deleteProcess(pid)
    this.processes.delete(pid)

    this.log.record("process_terminated", `Process P${pid} terminated`, {
      pid,
      freedFrames: freedFrames.length,
    })

    return { kind: "removed", pid, freedFrames }
  }

  snapshot(): MemorySnapshot {
    const { hits, faults, evictions } = this.counters
    const accesses = hits + faults

    return {
      frameCount: this.frameCount,
      frames: this.frames
        .toArray()
        .map((page) => (page ? { ...page, color: processColor(page.pid) } : null)),
      processes: [...this.processes.values()]
        .sort((a, b) => a.pid - b.pid)
        .map((process) => this.describe(process)),
      pageTable: [...this.pageTable.entries()]
        .sort((a, b) => a.frameIndex - b.frameIndex)
        .map((entry) => ({ ...entry })),
      evictionQueue: this.queue.toArray(),
      stats: { hits, faults, evictions, hitRatio: accesses === 0 ? 0 : hits / accesses },
      recentLog: this.log.recent(this.recentLogLimit),
    }
  }

  reset(): void {
    this.frames.clear()
    this.pageTable.clear()
    this.queue.clear()
    this.processes.clear()
    this.log.clear()
    this.counters = zeroCounters()
    this.nextPid = 1
    this.tick = 0

    this.logger.info("Memory reset", { frameCount: this.frameCount })
  }

  private fault(page: PageRef, policy: ReplacementPolicy, now: Tick): AccessPageResult {
    const free = this.frames.findFree()
    const frameIndex = free ?? this.selectVictim(policy)

    if (frameIndex === undefined) {
      this.logger.fatal("No frame available for page fault", {
        ...page,
        policy,
        occupiedFrames: this.frames.occupiedCount(),
        residentPages: this.pageTable.size(),
      })
      return { kind: "no_frames_available", ...page }
    }

    this.tick = now
    const evicted = free === undefined ? this.evict(frameIndex) : undefined

    this.counters.faults++
    this.frames.occupy(frameIndex, page)
    this.pageTable.set({ ...page, frameIndex, allocatedAt: now, lastUsedAt: now })
    this.queue.enqueue(frameIndex)

    this.log.record(
      "page_allocated",
      `Allocated P${page.pid} page ${page.pageNumber} to frame ${frameIndex}`,
      { ...page, frameIndex, policy },
    )

    const result: PageFault = { kind: "fault", ...page, frameIndex }
    return evicted ? { ...result, evicted } : result
  }

  private selectVictim(policy: ReplacementPolicy): FrameIndex | undefined {
    return this.selectors[policy].select({
      oldestAdmitted: () => this.queue.head(),
      residents: () => this.pageTable.entries(),
    })
  }

  private evict(frameIndex: FrameIndex): PageRef | undefined {
    const victim = this.frames.release(frameIndex)
    if (!victim) return undefined

    this.pageTable.delete(victim.pid, victim.pageNumber)
    this.queue.remove(frameIndex)
    this.counters.evictions++

    this.log.record(
      "page_evicted",
      `Page fault: Evicting P${victim.pid} page ${victim.pageNumber}`,
      { pid: victim.pid, pageNumber: victim.pageNumber, frameIndex },
    )

    return victim
  }

  private describe(process: ProcessRecord): ProcessDescriptor {
    return {
      pid: process.pid,
      pageCount: process.pageCount,
      color: process.color,
      pages: Array.from({ length: process.pageCount }, (_, pageNumber) => ({
        pageNumber,
        frameIndex: this.pageTable.get(process.pid, pageNumber)?.frameIndex ?? null,
      })),
    }
  }
}
