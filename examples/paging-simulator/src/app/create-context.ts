import { fileURLToPath } from "node:url"
import { type AppConfig, type EnvOverrides, loadAppConfig } from "./config"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type RegisterRoutesFn, registerRoutes } from "./routes"
import { type AppServices, createDomainServices, type DomainOverrides } from "./services"
import { type CoreServices, createCoreServices } from "./services/core"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  configOverrides?: EnvOverrides
  coreOverrides?: Partial<CoreServices>
  domainOverrides?: DomainOverrides
}

export type AppContext = {
  config: AppConfig
  services: AppServices
  registerRoutes: RegisterRoutesFn
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const projectRoot = fileURLToPath(new URL("../..", import.meta.url))

  const config = await loadAppConfig(
    options.env ?? process.env,
    options.configOverrides,
    projectRoot,
  )

  const core: CoreServices = { ...createCoreServices(config), ...options.coreOverrides }
  const domains = createDomainServices(config, core, options.domainOverrides)

  return {
    config,
    services: { ...core, ...domains },
    registerRoutes,
    createStartHooks,
    createStopHooks,
  }
}
