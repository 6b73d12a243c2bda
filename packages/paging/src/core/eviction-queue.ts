import type { FrameIndex } from "../ports/paging"

/** Frame indices in admission order; each frame appears at most once. */
export class EvictionQueue {
  private readonly order = new Set<FrameIndex>()

  /** Appends `frameIndex`, moving it to the tail if already queued. */
  enqueue(frameIndex: FrameIndex): void {
    this.order.delete(frameIndex)
    this.order.add(frameIndex)
  }

  remove(frameIndex: FrameIndex): boolean {
    return this.order.delete(frameIndex)
  }

  head(): FrameIndex | undefined {
    return this.order.values().next().value
  }

  has(frameIndex: FrameIndex): boolean {
    return this.order.has(frameIndex)
  }

  toArray(): FrameIndex[] {
    return [...this.order]
  }

  size(): number {
    return this.order.size
  }

  clear(): void {
    this.order.clear()
  }
}
