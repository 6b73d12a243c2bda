import type { PageFault, PageHit, PageRef, ReplacementPolicy } from "@pagesim/paging"

/** A successful access, hit or fault. */
export type AccessOutcome = PageHit | PageFault

export type AccessRequest = PageRef & {
  policy: ReplacementPolicy
}
