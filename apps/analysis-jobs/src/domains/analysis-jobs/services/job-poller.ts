import type { Clock, Milliseconds } from "@conduit/clock"
import type { Logger } from "@conduit/logger"
import type { AnalysisClient } from "../model/analysis-client.model"
import { type CompletionOutcome, toCompletionCandidate } from "../model/completion.model"
import { type AnalysisJob, isActive } from "../model/job.model"
import type { CompletionCoordinator } from "./completion-coordinator"
import type { JobMetrics } from "./job-metrics"
import type { JobStore } from "./job-store"

export type JobPollerDeps = {
  clock: Clock
  logger: Logger
  jobStore: JobStore
  analysisClient: AnalysisClient
  coordinator: CompletionCoordinator
  metrics: JobMetrics
}

export type JobPollerConfig = {
  /** Jobs updated more recently than this are left alone. */
  pollIntervalMs: Milliseconds

  /** Upper bound on status requests per sweep. */
  batchSize: number
}

export type PollSweepResult = {
  polled: number
  completions: Partial<Record<CompletionOutcome, number>>
  errors: number
}

/**
 * Fallback for lost webhooks: asks the analysis service about every active
 * job that has been quiet for a poll interval.
 *
 * @remarks
 * Poll failures are logged and left for the next sweep. They do not count
 * against the job's retry budget.
 */
export class JobPoller {
  public constructor(
    private readonly deps: JobPollerDeps,
    private readonly config: JobPollerConfig,
  ) {}

  async sweep(): Promise<PollSweepResult> {
    const result: PollSweepResult = { polled: 0, completions: {}, errors: 0 }
    const now = this.deps.clock.nowMs()
    const due = (await this.deps.jobStore.listActive()).filter((job) => this.isDue(job, now))

    for (const job of due.slice(0, this.config.batchSize)) {
      result.polled++

      try {
        const outcome = await this.poll(job)
        if (outcome) {
          result.completions[outcome] = (result.completions[outcome] ?? 0) + 1
        }
      } catch (err) {
        result.errors++
        this.deps.metrics.recordPollError()
        this.deps.logger.warn("Polling analysis job failed", {
          err,
          jobId: job.id,
          tenantId: job.tenantId,
          ...(job.externalJobId !== undefined && { externalJobId: job.externalJobId }),
        })
      }
    }

    return result
  }

  private isDue(job: AnalysisJob, now: number): boolean {
    return (
      isActive(job.status) &&
      job.externalJobId !== undefined &&
      now - job.updatedAt.getTime() >= this.config.pollIntervalMs
    )
  }

  private async poll(job: AnalysisJob): Promise<CompletionOutcome | null> {
    const externalJobId = job.externalJobId
    if (externalJobId === undefined) return null

    const state = await this.deps.analysisClient.getStatus(externalJobId, job.tenantId)
    const candidate = toCompletionCandidate(state, "poller", externalJobId)

    if (!candidate) return null

    const res = await this.deps.coordinator.complete(
      { tenantId: job.tenantId, jobId: job.id },
      candidate,
    )

    return res.outcome
  }
}
