import type { FrameIndex, PageRef, Pid } from "../ports/paging"

/** Fixed-size array of physical frames, each empty or holding one page. */
export class FramePool {
  private readonly slots: (PageRef | null)[]

  constructor(readonly frameCount: number) {
    this.slots = Array.from({ length: frameCount }, () => null)
  }

  /** Lowest empty frame. */
  findFree(): FrameIndex | undefined {
    const index = this.slots.indexOf(null)
    return index === -1 ? undefined : index
  }

  occupant(frameIndex: FrameIndex): PageRef | null {
    return this.slots[frameIndex] ?? null
  }

  occupy(frameIndex: FrameIndex, page: PageRef): void {
    this.slots[frameIndex] = { pid: page.pid, pageNumber: page.pageNumber }
  }

  /** Empties the frame and returns what it held. */
  release(frameIndex: FrameIndex): PageRef | null {
    const previous = this.occupant(frameIndex)
    if (previous) this.slots[frameIndex] = null
    return previous
  }

  /** Ascending. */
  framesOwnedBy(pid: Pid): FrameIndex[] {
    const owned: FrameIndex[] = []

    this.slots.forEach((slot, index) => {
      if (slot?.pid === pid) owned.push(index)
    })

    return owned
  }

  occupiedCount(): number {
    return this.slots.reduce((count, slot) => (slot ? count + 1 : count), 0)
  }

  toArray(): (PageRef | null)[] {
    return this.slots.map((slot) => (slot ? { ...slot } : null))
  }

  clear(): void {
    this.slots.fill(null)
  }
}
