import { type Context, parseOrThrow, type RequestHandler } from "@conduit/server"
import type { AnalysisJobServices } from "../composition"
import { submitJobRequestSchema } from "./job.api.schema"
import { type JobView, toJobView } from "./job.view"
import { readJsonBody, requireTenant } from "./request"

export function submitJobHandler({ submitter }: AnalysisJobServices): RequestHandler {
  return async (c: Context) => {
    const tenantId = requireTenant(c)
    const body = parseOrThrow(submitJobRequestSchema, await readJsonBody(c))

    const { job, created } = await submitter.submit({
      tenantId,
      subjectId: body.subject_id,
      kind: body.job_kind,
      input: {
        reference: body.input.reference,
        ...(body.input.metadata !== undefined && { metadata: body.input.metadata }),
      },
    })

    return c.json<JobView>(toJobView(job), created ? 201 : 200)
  }
}
