import type { FrameIndex } from "../../ports/paging"
import type { VictimCandidates, VictimSelector } from "../../ports/victim-selector"

/** Oldest admission wins, however recently it was hit. */
export class FifoVictimSelector implements VictimSelector {
  readonly policy = "fifo"

  select(candidates: VictimCandidates): FrameIndex | undefined {
    return candidates.oldestAdmitted()
  }
}
