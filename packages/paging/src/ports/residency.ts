import type { FrameIndex, PageRef, Tick } from "./paging"

/** Exists only while the page is resident. `lastUsedAt >= allocatedAt`. */
export type ResidencyEntry = PageRef & {
  frameIndex: FrameIndex
  allocatedAt: Tick
  lastUsedAt: Tick
}
