import type { RandomSource } from "../../ports/random-source"

export const systemRandom: RandomSource = {
  next(): number {
    return Math.random()
  },
}

/** Replays `values` in order, cycling. For deterministic runs. */
export function sequenceRandom(values: readonly number[]): RandomSource {
  let index = 0

  return {
    next(): number {
      const value = values[index % values.length] ?? 0
      index++
      return value
    },
  }
}
