import type { FrameIndex, PageNumber, PageRef, Pid } from "@pagesim/paging"
import type { AccessOutcome } from "../model/simulator.model"

export type AccessResponse = {
  success: true
  hit: boolean
  pid: Pid
  pageNumber: PageNumber
  frameIndex: FrameIndex
  evicted?: PageRef
}

export function toAccessResponse(outcome: AccessOutcome): AccessResponse {
  const response: AccessResponse = {
    success: true,
    hit: outcome.kind === "hit",
    pid: outcome.pid,
    pageNumber: outcome.pageNumber,
    frameIndex: outcome.frameIndex,
  }

  if (outcome.kind === "fault" && outcome.evicted) response.evicted = outcome.evicted

  return response
}
