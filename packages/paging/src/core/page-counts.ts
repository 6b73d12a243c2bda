import { systemRandom } from "../adapters/random/system-random"
import type { PageCountSource } from "../ports/page-count-source"
import type { RandomSource } from "../ports/random-source"
import { MAX_PAGE_COUNT, PagingError, isPositiveInteger, isValidPageCount } from "./paging-error"

export function fixedPageCount(pageCount: number): PageCountSource {
  if (!isValidPageCount(pageCount)) throw PagingError.invalidPageCount(pageCount)

  return { next: () => pageCount }
}

export type PageCountRange = {
  min: number
  max: number
}

/** Uniform integer in `[min, max]`. */
export function randomPageCount(
  range: PageCountRange,
  random: RandomSource = systemRandom,
): PageCountSource {
  const { min, max } = range

  if (!isPositiveInteger(min)) throw PagingError.invalidConfiguration("min page count", min)
  if (!isPositiveInteger(max) || max < min || max > MAX_PAGE_COUNT) {
    throw PagingError.invalidConfiguration("max page count", max)
  }

  const span = max - min + 1

  return {
    next: () => min + Math.min(span - 1, Math.floor(random.next() * span)),
  }
}
