import {
  type AnalysisJobServices,
  createAnalysisJobServices,
} from "../../domains/analysis-jobs/composition"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraClients } from "./infra"

export type DomainServices = {
  analysisJobs: AnalysisJobServices
}

export type AppServices = {
  core: CoreServices
  domains: DomainServices
}

export function createDefaultDomainServices(
  config: AppConfig,
  infra: InfraClients,
  core: CoreServices,
): DomainServices {
  return {
    analysisJobs: createAnalysisJobServices(config, core, infra),
  }
}
