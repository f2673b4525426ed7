import type { CompletionCandidate } from "../model/completion.model"
import { type AnalysisJob, isTerminal } from "../model/job.model"
import { hashOutput } from "../model/output-hash"

export type CompletionDecision =
  | { outcome: "applied"; job: AnalysisJob }
  | { outcome: "skipped_terminal" }
  | { outcome: "skipped_duplicate" }

/**
 * Decides what a completion signal does to a job. No I/O: the coordinator
 * feeds it the record it read under the lock and persists what comes back.
 */
export function decideCompletion(
  job: AnalysisJob,
  candidate: CompletionCandidate,
  at: Date,
): CompletionDecision {
  if (isTerminal(job.status)) {
    return { outcome: "skipped_terminal" }
  }

  if (
    candidate.externalJobId !== undefined &&
    candidate.externalJobId !== job.externalJobId
  ) {
    return { outcome: "skipped_duplicate" }
  }

  const succeeded = candidate.status === "succeeded"
  const output = succeeded ? (candidate.output ?? {}) : candidate.output
  const hash = output === undefined ? undefined : hashOutput(output)

  if (hash !== undefined && hash === job.outputHash) {
    return { outcome: "skipped_duplicate" }
  }

  const {
    output: _output,
    outputHash: _outputHash,
    lastError: _lastError,
    nextAttemptAt: _nextAttemptAt,
    ...rest
  } = job

  const lastError = succeeded ? undefined : (candidate.error ?? job.lastError)

  return {
    outcome: "applied",
    job: {
      ...rest,
      status: candidate.status,
      updatedAt: at,
      ...(output !== undefined && { output }),
      ...(succeeded && hash !== undefined && { outputHash: hash }),
      ...(lastError !== undefined && { lastError }),
    },
  }
}
