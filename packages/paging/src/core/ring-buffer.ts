import { PagingError, isPositiveInteger } from "./paging-error"

/** Fixed-capacity buffer that overwrites its oldest item when full. */
export class RingBuffer<T> {
  private readonly items: (T | undefined)[]
  private start = 0
  private count = 0

  constructor(readonly capacity: number) {
    if (!isPositiveInteger(capacity)) throw PagingError.invalidConfiguration("capacity", capacity)

    this.items = new Array<T | undefined>(capacity).fill(undefined)
  }

  get size(): number {
    return this.count
  }

  /** Returns the item that was overwritten, if any. */
  push(item: T): T | undefined {
    const slot = (this.start + this.count) % this.capacity

    if (this.count < this.capacity) {
      this.items[slot] = item
      this.count++
      return undefined
    }

    const overwritten = this.items[this.start]
    this.items[this.start] = item
    this.start = (this.start + 1) % this.capacity
    return overwritten
  }

  /** Oldest first. */
  toArray(): T[] {
    return this.latest(this.count)
  }

  /** The newest `n` items, oldest first. */
  latest(n: number): T[] {
    const take = Math.max(0, Math.min(n, this.count))
    const out: T[] = []

    for (let i = this.count - take; i < this.count; i++) {
      const item = this.items[(this.start + i) % this.capacity]
      if (item !== undefined) out.push(item)
    }

    return out
  }

  clear(): void {
    this.items.fill(undefined)
    this.start = 0
    this.count = 0
  }
}
