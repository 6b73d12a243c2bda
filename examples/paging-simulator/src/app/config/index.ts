export { loadAppConfig, mapEnvToConfig } from "./load-app-config"
export type { AppConfig, EnvConfig, EnvOverrides } from "./schema"
export { envSchema } from "./schema"
