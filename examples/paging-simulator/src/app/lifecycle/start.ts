import type { LifecycleHook } from "@pagesim/server"
import type { AppContext } from "../create-context"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  return [
    {
      name: "start:memory:log-configuration",
      fn: async () => {
        const { memory } = context.config

        context.services.logger.info("Memory simulator ready", {
          frameCount: context.services.memory.manager.frameCount,
          policy: memory.defaultPolicy,
          pageCounts: memory.pageCounts,
        })
      },
    },
  ]
}

export type CreateStartHooksFn = typeof createStartHooks
