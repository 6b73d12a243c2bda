import type { FrameIndex, PageRef } from "./paging"
import type { ProcessDescriptor } from "./process"
import type { ResidencyEntry } from "./residency"

export const eventKinds = [
  "process_created",
  "page_hit",
  "page_evicted",
  "page_allocated",
  "process_terminated",
] as const

export type EventKind = (typeof eventKinds)[number]

export type LogEntry = {
  timestamp: Date
  kind: EventKind
  message: string
}

export type FrameView = PageRef & {
  color: string
}

export type MemoryStats = {
  hits: number
  faults: number
  evictions: number
  /** `hits / (hits + faults)`, 0 before the first access. */
  hitRatio: number
}

export type MemorySnapshot = {
  frameCount: number
  /** Indexed by frame; `null` marks a free frame. */
  frames: (FrameView | null)[]
  /** Ordered by pid. */
  processes: ProcessDescriptor[]
  /** Ordered by frame index. */
  pageTable: ResidencyEntry[]
  /** Admission order, oldest first. */
  evictionQueue: FrameIndex[]
  stats: MemoryStats
  /** Oldest first. */
  recentLog: LogEntry[]
}
