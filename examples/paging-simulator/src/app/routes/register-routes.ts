import { type Application, createRouter } from "@pagesim/server"
import { createMemoryModule } from "../../domains/memory/api"
import type { AppConfig } from "../config"
import type { DomainServices } from "../services"

export type ApiModule = {
  name: string
  register: (app: Application) => void
}

export function registerRoutes(
  app: Application,
  config: AppConfig,
  services: DomainServices,
): void {
  const apiV1Router = createRouter()

  const modules: ApiModule[] = [createMemoryModule({ memory: services.memory })]

  for (const m of modules) {
    m.register(apiV1Router)
  }

  app.route("/api/v1", apiV1Router)
  app.get("/", (c) => c.text(`Welcome to ${config.logging.serviceName} API`))
}

export type RegisterRoutesFn = typeof registerRoutes
