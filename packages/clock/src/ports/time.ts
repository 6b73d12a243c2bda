/** Milliseconds, either a duration or an instant since the Unix epoch. */
export type Milliseconds = number

export type Sleep = (ms: Milliseconds, signal?: AbortSignal) => Promise<void>
