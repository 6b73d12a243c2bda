/** Supplies the page count of processes created without one. */
export interface PageCountSource {
  next(): number
}
