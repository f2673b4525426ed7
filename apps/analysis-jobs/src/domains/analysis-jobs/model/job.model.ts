import { type Brand, prefixedId } from "@conduit/id"

export type JobId = Brand<string, "JobId">
export const JobId = prefixedId<JobId>({ kind: "JobId", prefix: "job" })

export const jobKinds = ["csr_call", "sales_visit", "segmentation"] as const
export type JobKind = (typeof jobKinds)[number]

export const jobStatuses = ["pending", "running", "succeeded", "failed", "timeout"] as const
export type JobStatus = (typeof jobStatuses)[number]

export type ActiveStatus = Extract<JobStatus, "pending" | "running">
export type TerminalStatus = Exclude<JobStatus, ActiveStatus>

export type JobPayload = Record<string, unknown>

export type JobInput = {
  /** Location the analysis service fetches the recording from. */
  reference: string
  metadata?: JobPayload | undefined
}

export type NaturalKey = {
  tenantId: string
  subjectId: string
  kind: JobKind
}

export interface AnalysisJob extends NaturalKey {
  id: JobId
  status: JobStatus

  /** Assigned by the analysis service once it accepts the submission. */
  externalJobId?: string

  input: JobInput
  output?: JobPayload

  /** Present only while `status` is "succeeded". */
  outputHash?: string

  retryCount: number
  lastError?: string

  /** Start of the current attempt; lifetime limits count from here. */
  attemptStartedAt: Date

  /** Earliest time the supervisor may start the next retry. */
  nextAttemptAt?: Date

  /** Set once retries ran out and the failure was reported. */
  exhaustedAt?: Date

  createdAt: Date
  updatedAt: Date
}

export function isTerminal(status: JobStatus): status is TerminalStatus {
  return status === "succeeded" || status === "failed" || status === "timeout"
}

export function isActive(status: JobStatus): status is ActiveStatus {
  return !isTerminal(status)
}

/** Parts are percent-encoded so a `:` inside one can never shift the boundaries. */
export function naturalKeyOf(job: NaturalKey): string {
  return [job.tenantId, job.kind, job.subjectId].map(encodeURIComponent).join(":")
}

export function retriesLeft(job: AnalysisJob, maxRetries: number): boolean {
  return job.exhaustedAt === undefined && job.retryCount < maxRetries
}

/**
 * Whether a new submission for the same subject should be answered with
 * this job instead of starting another one.
 */
export function holdsNaturalKey(job: AnalysisJob, maxRetries: number): boolean {
  switch (job.status) {
    case "pending":
    case "running":
      return true
    case "failed":
    case "timeout":
      return retriesLeft(job, maxRetries)
    case "succeeded":
      return false
  }
}

/** Whether the poller or the supervisor may still have work to do on this job. */
export function needsSupervision(job: AnalysisJob): boolean {
  switch (job.status) {
    case "pending":
    case "running":
      return true
    case "failed":
    case "timeout":
      return job.exhaustedAt === undefined
    case "succeeded":
      return false
  }
}
