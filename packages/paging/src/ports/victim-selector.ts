import type { FrameIndex } from "./paging"
import type { ReplacementPolicy } from "./replacement-policy"
import type { ResidencyEntry } from "./residency"

/** Read-only view of the resident set offered to a selector. */
export type VictimCandidates = {
  /** Head of the admission queue. */
  oldestAdmitted(): FrameIndex | undefined
  residents(): Iterable<ResidencyEntry>
}

export interface VictimSelector {
  readonly policy: ReplacementPolicy

  /** Frame to evict, or `undefined` when nothing is resident. */
  select(candidates: VictimCandidates): FrameIndex | undefined
}
