export { loadAppConfig, mapEnvToConfig } from "./load-app-config"
export type { AppConfig, EnvConfig, JobStoreDriver } from "./schema"
