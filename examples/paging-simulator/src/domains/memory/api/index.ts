import { type Application, createRouter } from "@pagesim/server"
import type { MemoryServices } from "../composition"
import { accessPageHandler } from "./access-page.handler"
import { createProcessHandler } from "./create-process.handler"
import { getStateHandler } from "./get-state.handler"
import { removeProcessHandler } from "./remove-process.handler"
import { resetHandler } from "./reset.handler"
import { simulateAccessHandler } from "./simulate-access.handler"

export { memoryErrorMappings } from "./memory.error-mappings"

type MemoryModuleDeps = {
  memory: MemoryServices
}

export function createMemoryModule(deps: MemoryModuleDeps) {
  return {
    name: "memory",
    register: (api: Application) => {
      const processes = createRouter()

      processes.post("/", createProcessHandler(deps.memory))
      processes.delete("/:pid", removeProcessHandler(deps.memory))
      processes.post("/:pid/pages/:page/access", accessPageHandler(deps.memory))

      api.get("/state", getStateHandler(deps.memory))
      api.post("/simulate", simulateAccessHandler(deps.memory))
      api.post("/reset", resetHandler(deps.memory))
      api.route("/processes", processes)
    },
  }
}
