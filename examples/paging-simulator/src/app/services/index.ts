import {
  createMemoryServices,
  type MemoryServiceOverrides,
  type MemoryServices,
} from "../../domains/memory/composition"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type DomainServices = {
  memory: MemoryServices
}

export type DomainOverrides = {
  memory?: MemoryServiceOverrides
}

export function createDomainServices(
  config: AppConfig,
  core: CoreServices,
  overrides: DomainOverrides = {},
): DomainServices {
  return {
    memory: createMemoryServices(config, core, overrides.memory),
  }
}

export type AppServices = CoreServices & DomainServices
