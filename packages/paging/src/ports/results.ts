import type { FrameIndex, PageNumber, PageRef, Pid } from "./paging"

export type PageHit = {
  kind: "hit"
  pid: Pid
  pageNumber: PageNumber
  frameIndex: FrameIndex
}

export type PageFault = {
  kind: "fault"
  pid: Pid
  pageNumber: PageNumber
  frameIndex: FrameIndex
  /** Page that was displaced to make room, absent when a free frame was used. */
  evicted?: PageRef
}

export type ProcessNotFound = {
  kind: "process_not_found"
  pid: Pid
}

export type InvalidPage = {
  kind: "invalid_page"
  pid: Pid
  pageNumber: PageNumber
  pageCount: number
}

/** Broken invariant: no free frame and no victim. State is left untouched. */
export type NoFramesAvailable = {
  kind: "no_frames_available"
  pid: Pid
  pageNumber: PageNumber
}

export type AccessPageResult = PageHit | PageFault | ProcessNotFound | InvalidPage | NoFramesAvailable

export type AccessPageFailure = Exclude<AccessPageResult, PageHit | PageFault>

export type ProcessRemoved = {
  kind: "removed"
  pid: Pid
  /** Ascending. */
  freedFrames: FrameIndex[]
}

export type RemoveProcessResult = ProcessRemoved | ProcessNotFound
