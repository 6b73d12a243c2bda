export type Pid = number
export type PageNumber = number
export type FrameIndex = number

/** Logical time. Advances by one on every successful access. */
export type Tick = number

/** Structural key of a virtual page. */
export type PageRef = {
  pid: Pid
  pageNumber: PageNumber
}
