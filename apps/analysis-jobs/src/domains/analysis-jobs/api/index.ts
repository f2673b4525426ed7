import type { Logger } from "@conduit/logger"
import { type Application, createRouter } from "@conduit/server"
import type { AnalysisJobServices } from "../composition"
import { analysisWebhookHandler } from "./analysis-webhook.handler"
import { getJobHandler } from "./get-job.handler"
import { jobMetricsHandler } from "./job-metrics.handler"
import { submitJobHandler } from "./submit-job.handler"

type AnalysisJobsModuleDeps = {
  analysisJobs: AnalysisJobServices
  logger: Logger
}

export function createAnalysisJobsModule(deps: AnalysisJobsModuleDeps) {
  return {
    name: "analysis-jobs",
    register: (api: Application) => {
      const jobs = createRouter()

      jobs.post("/", submitJobHandler(deps.analysisJobs))
      jobs.get("/:id", getJobHandler(deps.analysisJobs))

      const webhooks = createRouter()

      webhooks.post("/analysis", analysisWebhookHandler(deps.analysisJobs, deps.logger))

      api.route("/jobs", jobs)
      api.route("/webhooks", webhooks)
      api.get("/metrics/jobs", jobMetricsHandler(deps.analysisJobs))
    },
  }
}
