import type { ReplacementPolicy } from "../../ports/replacement-policy"
import type { VictimSelector } from "../../ports/victim-selector"
import { FifoVictimSelector } from "./fifo-victim-selector"
import { LruVictimSelector } from "./lru-victim-selector"

export { FifoVictimSelector } from "./fifo-victim-selector"
export { LruVictimSelector } from "./lru-victim-selector"

export const victimSelectors: Readonly<Record<ReplacementPolicy, VictimSelector>> = {
  fifo: new FifoVictimSelector(),
  lru: new LruVictimSelector(),
}
