export { sequenceRandom, systemRandom } from "./adapters/random/system-random"
export { EventLog, type EventLogDeps } from "./core/event-log"
export { EvictionQueue } from "./core/eviction-queue"
export { FramePool } from "./core/frame-pool"
export { PageTable } from "./core/page-table"
export { type PageCountRange, fixedPageCount, randomPageCount } from "./core/page-counts"
export { MAX_PAGE_COUNT, PagingError, type PagingErrorCode } from "./core/paging-error"
export {
  DEFAULT_FRAME_COUNT,
  DEFAULT_LOG_CAPACITY,
  DEFAULT_RECENT_LOG_LIMIT,
  PagingMemoryManager,
  type PagingMemoryManagerDeps,
  type PagingMemoryManagerOptions,
} from "./core/paging-memory-manager"
export { processColor } from "./core/process-color"
export { RingBuffer } from "./core/ring-buffer"
export { FifoVictimSelector, LruVictimSelector, victimSelectors } from "./core/victim-selectors"
export type { MemoryManager } from "./ports/memory-manager"
export type { PageCountSource } from "./ports/page-count-source"
export type { FrameIndex, PageNumber, PageRef, Pid, Tick } from "./ports/paging"
export type { CreateProcessInput, PageDescriptor, ProcessDescriptor } from "./ports/process"
export type { RandomSource } from "./ports/random-source"
export {
  type ReplacementPolicy,
  isReplacementPolicy,
  replacementPolicies,
} from "./ports/replacement-policy"
export type { ResidencyEntry } from "./ports/residency"
export type {
  AccessPageFailure,
  AccessPageResult,
  InvalidPage,
  NoFramesAvailable,
  PageFault,
  PageHit,
  ProcessNotFound,
  ProcessRemoved,
  RemoveProcessResult,
} from "./ports/results"
export {
  type EventKind,
  type FrameView,
  type LogEntry,
  type MemorySnapshot,
  type MemoryStats,
  eventKinds,
} from "./ports/snapshot"
export type { VictimCandidates, VictimSelector } from "./ports/victim-selector"
