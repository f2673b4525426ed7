import type { CompletionOutcome, CompletionSource } from "../model/completion.model"

export type JobMetricsSnapshot = {
  submissions: { created: number; deduplicated: number }
  completions: Record<CompletionOutcome, number>
  completionsBySource: Record<CompletionSource, number>
  retries: number
  timeouts: number
  exhausted: number
  pollErrors: number
}

/**
 * Process-local counters. Retry exhaustion is reported here rather than
 * thrown, so operators can alert on it.
 */
export class JobMetrics {
  private submissions = { created: 0, deduplicated: 0 }

  private completions: Record<CompletionOutcome, number> = {
    applied: 0,
    skipped_duplicate: 0,
    skipped_terminal: 0,
    lock_busy: 0,
  }

  private completionsBySource: Record<CompletionSource, number> = {
    webhook: 0,
    poller: 0,
    supervisor: 0,
    submitter: 0,
  }

  private retries = 0
  private timeouts = 0
  private exhausted = 0
  private pollErrors = 0

  recordSubmission(created: boolean): void {
    if (created) this.submissions.created++
    else this.submissions.deduplicated++
  }

  recordCompletion(source: CompletionSource, outcome: CompletionOutcome): void {
    this.completions[outcome]++
    if (outcome === "applied") this.completionsBySource[source]++
  }

  recordRetry(): void {
    this.retries++
  }

  recordTimeout(): void {
    this.timeouts++
  }

  recordExhausted(): void {
    this.exhausted++
  }

  recordPollError(): void {
    this.pollErrors++
  }

  snapshot(): JobMetricsSnapshot {
    return {
      submissions: { ...this.submissions },
      completions: { ...this.completions },
      completionsBySource: { ...this.completionsBySource },
      retries: this.retries,
      timeouts: this.timeouts,
      exhausted: this.exhausted,
      pollErrors: this.pollErrors,
    }
  }
}
