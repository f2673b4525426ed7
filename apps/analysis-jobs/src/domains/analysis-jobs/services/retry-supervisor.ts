import type { DelayPolicy } from "@conduit/backoff"
import type { Clock, Milliseconds } from "@conduit/clock"
import type { Logger } from "@conduit/logger"
import { type AnalysisJob, isActive } from "../model/job.model"
import type { CompletionCoordinator } from "./completion-coordinator"
import type { JobMetrics } from "./job-metrics"
import type { JobStore } from "./job-store"
import type { JobSubmitter } from "./job-submitter"

export type RetrySupervisorDeps = {
  clock: Clock
  logger: Logger
  jobStore: JobStore
  coordinator: CompletionCoordinator
  submitter: Pick<JobSubmitter, "dispatch">
  metrics: JobMetrics
}

export type RetrySupervisorConfig = {
  maxRetries: number

  /** Measured from the start of the current attempt. */
  maxJobLifetimeMs: Milliseconds

  /** Delay before retry n, given n - 1 (the job's current retry count). */
  retryBackoff: DelayPolicy
}

export type SupervisorAction = "timedOut" | "scheduled" | "retried" | "exhausted"

export type SupervisorSweepResult = Record<SupervisorAction, number> & {
  errors: number
}

/**
 * Times out jobs that outlive their attempt and drives the bounded retry
 * cycle for failed, timed out and never-accepted jobs.
 *
 * @remarks
 * A retry is first scheduled with backoff, then started on a later sweep.
 * Timeouts go through the coordinator like any other completion, so a late
 * webhook and the timeout cannot both win.
 */
export class RetrySupervisor {
  public constructor(
    private readonly deps: RetrySupervisorDeps,
    private readonly config: RetrySupervisorConfig,
  ) {}

  async sweep(): Promise<SupervisorSweepResult> {
    const result: SupervisorSweepResult = {
      timedOut: 0,
      scheduled: 0,
      retried: 0,
      exhausted: 0,
      errors: 0,
    }

    for (const job of await this.deps.jobStore.listActive()) {
      try {
        const action = await this.supervise(job)
        if (action) result[action]++
      } catch (err) {
        result.errors++
        this.deps.logger.error("Supervising analysis job failed", {
          err,
          jobId: job.id,
          tenantId: job.tenantId,
        })
      }
    }

    return result
  }

  private async supervise(job: AnalysisJob): Promise<SupervisorAction | null> {
    const now = this.deps.clock.now()

    if (isActive(job.status) && this.hasExpired(job, now)) {
      return this.timeOut(job)
    }

    if (!awaitsRetry(job)) return null

    if (job.retryCount >= this.config.maxRetries) return this.exhaust(job)

    if (job.nextAttemptAt === undefined) return this.schedule(job, now)

    if (job.nextAttemptAt.getTime() <= now.getTime()) return this.retry(job, now)

    return null
  }

  private hasExpired(job: AnalysisJob, now: Date): boolean {
    return now.getTime() - job.attemptStartedAt.getTime() > this.config.maxJobLifetimeMs
  }

  private async timeOut(job: AnalysisJob): Promise<SupervisorAction | null> {
    const res = await this.deps.coordinator.complete(
      { tenantId: job.tenantId, jobId: job.id },
      {
        status: "timeout",
        source: "supervisor",
        error: `Job exceeded its lifetime of ${this.config.maxJobLifetimeMs}ms`,
      },
    )

    if (res.outcome !== "applied") return null

    this.deps.metrics.recordTimeout()

    return "timedOut"
  }

  private async schedule(job: AnalysisJob, now: Date): Promise<SupervisorAction | null> {
    const delay = this.config.retryBackoff.getDelay(job.retryCount)
    const nextAttemptAt = new Date(now.getTime() + delay.milliseconds)

    const res = await this.deps.jobStore.update(job.id, (current) =>
      sameAttempt(current, job) && awaitsRetry(current) && current.nextAttemptAt === undefined
        ? { ...current, nextAttemptAt, updatedAt: now }
        : null,
    )

    if (res.kind !== "updated") return null

    this.deps.logger.info("Analysis job retry scheduled", {
      jobId: job.id,
      tenantId: job.tenantId,
      retryCount: job.retryCount,
      delayMs: delay.milliseconds,
    })

    return "scheduled"
  }

  private async retry(job: AnalysisJob, now: Date): Promise<SupervisorAction | null> {
    const res = await this.deps.jobStore.update(job.id, (current) => {
      if (!sameAttempt(current, job) || !awaitsRetry(current)) return null
      if (current.nextAttemptAt === undefined || current.nextAttemptAt > now) return null

      const {
        output: _output,
        outputHash: _outputHash,
        externalJobId: _externalJobId,
        nextAttemptAt: _nextAttemptAt,
        lastError: _lastError,
        ...rest
      } = current

      return {
        ...rest,
        status: "pending",
        retryCount: current.retryCount + 1,
        attemptStartedAt: now,
        updatedAt: now,
      }
    })

    if (res.kind !== "updated") return null

    this.deps.metrics.recordRetry()
    this.deps.logger.info("Retrying analysis job", {
      jobId: job.id,
      tenantId: job.tenantId,
      retryCount: res.job.retryCount,
      ...(job.lastError !== undefined && { lastError: job.lastError }),
    })

    await this.deps.submitter.dispatch(res.job)

    return "retried"
  }

  /**
   * Final state for a job that used up its retries. A job whose submission
   * never got through is failed first so it ends up `failed` like the rest.
   */
  private async exhaust(job: AnalysisJob): Promise<SupervisorAction | null> {
    if (isActive(job.status)) {
      await this.deps.coordinator.complete(
        { tenantId: job.tenantId, jobId: job.id },
        {
          status: "failed",
          source: "supervisor",
          error: job.lastError ?? "Submission never accepted",
        },
      )
    }

    const res = await this.deps.jobStore.update(job.id, (current) =>
      sameAttempt(current, job) && !isActive(current.status) && current.exhaustedAt === undefined
        ? { ...current, exhaustedAt: this.deps.clock.now() }
        : null,
    )

    if (res.kind !== "updated") return null

    this.deps.metrics.recordExhausted()
    this.deps.logger.warn("Analysis job retries exhausted", {
      jobId: job.id,
      tenantId: job.tenantId,
      status: res.job.status,
      retryCount: res.job.retryCount,
      ...(res.job.lastError !== undefined && { lastError: res.job.lastError }),
    })

    return "exhausted"
  }
}

function sameAttempt(current: AnalysisJob, seen: AnalysisJob): boolean {
  return current.retryCount === seen.retryCount
}

/**
 * Failed and timed out jobs wait for a retry until exhausted. So does a
 * pending job whose submission failed transiently and was never accepted.
 */
function awaitsRetry(job: AnalysisJob): boolean {
  switch (job.status) {
    case "failed":
    case "timeout":
      return job.exhaustedAt === undefined
    case "pending":
      return job.externalJobId === undefined && job.lastError !== undefined
    case "running":
    case "succeeded":
      return false
  }
}
