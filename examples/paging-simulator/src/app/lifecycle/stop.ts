import type { LifecycleHook } from "@pagesim/server"
import type { AppContext } from "../create-context"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  return [
    {
      name: "stop:memory:report",
      fn: async () => {
        const { stats } = await context.services.memory.simulator.state()

        context.services.logger.info("Final memory statistics", { ...stats })
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
