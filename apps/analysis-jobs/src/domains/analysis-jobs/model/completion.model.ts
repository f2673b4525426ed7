import type { ExternalJobState } from "./external-status"
import type { AnalysisJob, JobId, JobPayload, TerminalStatus } from "./job.model"

export type CompletionSource = "webhook" | "poller" | "supervisor" | "submitter"

export type CompletionCandidate = {
  status: TerminalStatus
  source: CompletionSource
  output?: JobPayload
  error?: string

  /**
   * Attempt the signal belongs to. Signals for an attempt the job has since
   * moved past are dropped.
   */
  externalJobId?: string
}

export const completionOutcomes = [
  "applied",
  "skipped_duplicate",
  "skipped_terminal",
  "lock_busy",
] as const

export type CompletionOutcome = (typeof completionOutcomes)[number]

export type CompletionResult =
  | { outcome: "applied"; job: AnalysisJob }
  | { outcome: Exclude<CompletionOutcome, "applied"> }

export type JobRef = {
  tenantId: string
  jobId: JobId
}

/**
 * Turns a status report into a completion candidate. A job still in flight
 * yields null; one the service no longer knows about counts as failed.
 */
export function toCompletionCandidate(
  state: ExternalJobState,
  source: CompletionSource,
  externalJobId: string,
): CompletionCandidate | null {
  switch (state.kind) {
    case "in_flight":
      return null
    case "succeeded":
      return { status: "succeeded", source, output: state.output, externalJobId }
    case "failed":
      return {
        status: "failed",
        source,
        error: state.error,
        externalJobId,
        ...(state.output !== undefined && { output: state.output }),
      }
    case "not_found":
      return {
        status: "failed",
        source,
        error: "External job not found",
        output: { reason: "external_job_not_found", external_job_id: externalJobId },
        externalJobId,
      }
  }
}
