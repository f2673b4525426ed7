import type { Context, RequestHandler } from "@conduit/server"
import type { AnalysisJobServices } from "../composition"
import type { JobMetricsSnapshot } from "../services/job-metrics"

export function jobMetricsHandler({ metrics }: AnalysisJobServices): RequestHandler {
  return async (c: Context) => c.json<JobMetricsSnapshot>(metrics.snapshot())
}
