import type { TimeSource } from "@pagesim/clock"
import type { LogMeta, Logger } from "@pagesim/logger"
import type { EventKind, LogEntry } from "../ports/snapshot"
import { RingBuffer } from "./ring-buffer"

export type EventLogDeps = {
  clock: TimeSource
  logger: Logger
}

const lifecycleEvents: ReadonlySet<EventKind> = new Set(["process_created", "process_terminated"])

/**
 * Bounded trail of simulator events.
 *
 * Each entry is also written to the structured logger: process lifecycle at
 * `info`, page traffic at `debug`.
 */
export class EventLog {
  private readonly entries: RingBuffer<LogEntry>

  constructor(
    private readonly deps: EventLogDeps,
    capacity: number,
  ) {
    this.entries = new RingBuffer(capacity)
  }

  get capacity(): number {
    return this.entries.capacity
  }

  get size(): number {
    return this.entries.size
  }

  record(kind: EventKind, message: string, meta: LogMeta = {}): LogEntry {
    const entry: LogEntry = { timestamp: this.deps.clock.now(), kind, message }

    this.entries.push(entry)

    if (lifecycleEvents.has(kind)) this.deps.logger.info(message, { ...meta, event: kind })
    else this.deps.logger.debug(message, { ...meta, event: kind })

    return copy(entry)
  }

  /** The newest `limit` entries, oldest first. */
  recent(limit: number): LogEntry[] {
    return this.entries.latest(limit).map(copy)
  }

  clear(): void {
    this.entries.clear()
  }
}

function copy(entry: LogEntry): LogEntry {
  return { ...entry, timestamp: new Date(entry.timestamp.getTime()) }
}
