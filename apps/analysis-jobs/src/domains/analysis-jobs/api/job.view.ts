import type { AnalysisJob, JobKind, JobPayload, JobStatus } from "../model/job.model"

export type JobView = {
  id: string
  tenantId: string
  subjectId: string
  kind: JobKind
  status: JobStatus
  externalJobId: string | null
  output: JobPayload | null
  retryCount: number
  lastError: string | null
  retriesExhausted: boolean
  createdAt: string
  updatedAt: string
}

export function toJobView(job: AnalysisJob): JobView {
  return {
    id: job.id,
    tenantId: job.tenantId,
    subjectId: job.subjectId,
    kind: job.kind,
    status: job.status,
    externalJobId: job.externalJobId ?? null,
    output: job.output ?? null,
    retryCount: job.retryCount,
    lastError: job.lastError ?? null,
    retriesExhausted: job.exhaustedAt !== undefined,
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
  }
}
