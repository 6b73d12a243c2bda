/**
 * Source of randomness.
 *
 * @remarks
 * `next()` must return a float in [0, 1).
 */
export interface RandomSource {
  next(): number
}
