import type { PageNumber, Pid } from "./paging"
import type { CreateProcessInput, ProcessDescriptor } from "./process"
import type { ReplacementPolicy } from "./replacement-policy"
import type { AccessPageResult, RemoveProcessResult } from "./results"
import type { MemorySnapshot } from "./snapshot"

/**
 * Paging simulator over a fixed pool of frames.
 *
 * Every operation is synchronous and either applies fully or returns a
 * non-success result without touching state. Callers sharing one instance
 * across requests must serialize access themselves.
 */
export interface MemoryManager {
  readonly frameCount: number

  createProcess(input?: CreateProcessInput): ProcessDescriptor

  accessPage(pid: Pid, pageNumber: PageNumber, policy: ReplacementPolicy): AccessPageResult

  removeProcess(pid: Pid): RemoveProcessResult

  /** Detached copy; never mutates. */
  snapshot(): MemorySnapshot

  /** Back to the freshly constructed state: pids restart at 1. */
  reset(): void
}
