export const replacementPolicies = ["fifo", "lru"] as const

export type ReplacementPolicy = (typeof replacementPolicies)[number]

export function isReplacementPolicy(value: unknown): value is ReplacementPolicy {
  return typeof value === "string" && replacementPolicies.some((p) => p === value)
}
