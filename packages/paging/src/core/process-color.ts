import type { Pid } from "../ports/paging"

/** Hue steps 137 degrees per pid. */
export function processColor(pid: Pid): string {
  return `hsl(${(pid * 137) % 360}, 70%, 60%)`
}
