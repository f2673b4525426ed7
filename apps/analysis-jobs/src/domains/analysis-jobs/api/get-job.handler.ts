import type { Context, RequestHandler } from "@conduit/server"
import type { AnalysisJobServices } from "../composition"
import { JobId } from "../model/job.model"
import { type JobView, toJobView } from "./job.view"
import { requireTenant } from "./request"

export function getJobHandler(deps: AnalysisJobServices): RequestHandler {
  return async (c: Context) => {
    const tenantId = requireTenant(c)
    const idParam = c.req.param("id")

    if (!JobId.is(idParam)) return c.notFound()

    const job = await deps.jobStore.get(tenantId, idParam)

    return job ? c.json<JobView>(toJobView(job)) : c.notFound()
  }
}
