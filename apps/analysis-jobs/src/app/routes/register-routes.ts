import { type Application, createRouter } from "@conduit/server"
import { createAnalysisJobsModule } from "../../domains/analysis-jobs"
import type { AppConfig } from "../config"
import type { AppServices } from "../services"

export type ApiModule = {
  name: string
  register: (app: Application) => void
}

export function registerRoutes(
  app: Application,
  config: AppConfig,
  services: AppServices,
): void {
  const apiV1Router = createRouter()

  const modules: ApiModule[] = [
    createAnalysisJobsModule({
      analysisJobs: services.domains.analysisJobs,
      logger: services.core.logger.child({ module: "analysis-jobs" }),
    }),
  ]

  for (const m of modules) {
    m.register(apiV1Router)
  }

  app.route("/api/v1", apiV1Router)
  app.get("/", (c) => c.text(`Welcome to ${config.logging.serviceName} API`))
}

export type RegisterRoutesFn = typeof registerRoutes
