import type { FrameIndex, PageNumber, Pid } from "./paging"

export type PageDescriptor = {
  pageNumber: PageNumber
  /** Frame currently holding the page, `null` while not resident. */
  frameIndex: FrameIndex | null
}

export type ProcessDescriptor = {
  pid: Pid
  pageCount: number
  pages: PageDescriptor[]
  /** Display tag, stable for a given pid. */
  color: string
}

export type CreateProcessInput = {
  /** Positive integer. Drawn from the page-count source when omitted. */
  pageCount?: number
}
