import type { FrameIndex } from "../../ports/paging"
import type { ResidencyEntry } from "../../ports/residency"
import type { VictimCandidates, VictimSelector } from "../../ports/victim-selector"

/**
 * Smallest `lastUsedAt` wins. Ties go to the lowest frame index, which keeps
 * the choice independent of table iteration order.
 */
export class LruVictimSelector implements VictimSelector {
  readonly policy = "lru"

  select(candidates: VictimCandidates): FrameIndex | undefined {
    let victim: ResidencyEntry | undefined

    for (const entry of candidates.residents()) {
      if (!victim || isLessRecent(entry, victim)) victim = entry
    }

    return victim?.frameIndex
  }
}

function isLessRecent(a: ResidencyEntry, b: ResidencyEntry): boolean {
  if (a.lastUsedAt !== b.lastUsedAt) return a.lastUsedAt < b.lastUsedAt
  return a.frameIndex < b.frameIndex
}
