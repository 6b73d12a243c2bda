import type { PageNumber, Pid, Tick } from "../ports/paging"
import type { ResidencyEntry } from "../ports/residency"

/** Residency entries keyed by pid, then page number. */
export class PageTable {
  private readonly byProcess = new Map<Pid, Map<PageNumber, ResidencyEntry>>()
  private count = 0

  get(pid: Pid, pageNumber: PageNumber): ResidencyEntry | undefined {
    return this.byProcess.get(pid)?.get(pageNumber)
  }

  set(entry: ResidencyEntry): void {
    let pages = this.byProcess.get(entry.pid)

    if (!pages) {
      pages = new Map()
      this.byProcess.set(entry.pid, pages)
    }

    if (!pages.has(entry.pageNumber)) this.count++
    pages.set(entry.pageNumber, { ...entry })
  }

  /** Refreshes `lastUsedAt`. */
  touch(pid: Pid, pageNumber: PageNumber, at: Tick): ResidencyEntry | undefined {
    const entry = this.get(pid, pageNumber)
    if (!entry) return undefined

    const touched = { ...entry, lastUsedAt: at }
    this.byProcess.get(pid)?.set(pageNumber, touched)
    return touched
  }

  delete(pid: Pid, pageNumber: PageNumber): boolean {
    const pages = this.byProcess.get(pid)
    if (!pages?.delete(pageNumber)) return false

    this.count--
    if (pages.size === 0) this.byProcess.delete(pid)
    return true
  }

  /** Drops every entry of `pid` and returns them. */
  deleteProcess(pid: Pid): ResidencyEntry[] {
    const pages = this.byProcess.get(pid)
    if (!pages) return []

    this.byProcess.delete(pid)
    this.count -= pages.size
    return [...pages.values()]
  }

  *entries(): IterableIterator<ResidencyEntry> {
    for (const pages of this.byProcess.values()) {
      yield* pages.values()
    }
  }

  size(): number {
    return this.count
  }

  clear(): void {
    this.byProcess.clear()
    this.count = 0
  }
}
