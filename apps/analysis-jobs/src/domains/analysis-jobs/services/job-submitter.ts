import type { Clock } from "@conduit/clock"
import { BaseError, describeError } from "@conduit/errors"
import type { Logger } from "@conduit/logger"
import type { AnalysisClient } from "../model/analysis-client.model"
import { JobError } from "../model/job.errors"
import { type AnalysisJob, JobId } from "../model/job.model"
import { type SubmitJobInput, submitJobInputSchema } from "../model/job.schema"
import type { CompletionCoordinator } from "./completion-coordinator"
import type { JobMetrics } from "./job-metrics"
import type { JobStore } from "./job-store"

export type JobSubmitterDeps = {
  clock: Clock
  logger: Logger
  jobStore: JobStore
  analysisClient: AnalysisClient
  coordinator: CompletionCoordinator
  metrics: JobMetrics
}

export type SubmitJobResult = {
  job: AnalysisJob

  /** False when an active job for the same subject was returned instead. */
  created: boolean
}

export class JobSubmitter {
  public constructor(private readonly deps: JobSubmitterDeps) {}

  /**
   * Idempotent per tenant, subject and kind: while a job for the triple is
   * still active it is returned as is and nothing is sent out.
   *
   * @throws JobError `invalid_submission` on malformed input. Failures of the
   * outbound call are recorded on the job, never thrown.
   */
  async submit(input: SubmitJobInput): Promise<SubmitJobResult> {
    const parsed = submitJobInputSchema.safeParse(input)

    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw JobError.invalidSubmission(
        issue ? `${issue.path.join(".") || "input"}: ${issue.message}` : "invalid input",
      )
    }

    const { tenantId, subjectId, kind, input: jobInput } = parsed.data
    const now = this.deps.clock.now()

    const created = await this.deps.jobStore.create({
      id: JobId.generate(),
      tenantId,
      subjectId,
      kind,
      status: "pending",
      input: jobInput,
      retryCount: 0,
      attemptStartedAt: now,
      createdAt: now,
      updatedAt: now,
    })

    this.deps.metrics.recordSubmission(created.kind === "created")

    if (created.kind === "existing") {
      this.deps.logger.debug("Returning active job for duplicate submission", {
        tenantId,
        jobId: created.job.id,
        kind,
      })
      return { job: created.job, created: false }
    }

    this.deps.logger.info("Analysis job created", { tenantId, jobId: created.job.id, kind })

    return { job: await this.dispatch(created.job), created: true }
  }

  /**
   * Sends a pending job to the analysis service. Used for first submissions
   * and for retries of the same job.
   */
  async dispatch(job: AnalysisJob): Promise<AnalysisJob> {
    let externalJobId: string

    try {
      const ack = await this.deps.analysisClient.submit({
        jobId: job.id,
        tenantId: job.tenantId,
        subjectId: job.subjectId,
        kind: job.kind,
        input: job.input,
      })
      externalJobId = ack.externalJobId
    } catch (err) {
      return this.handleDispatchFailure(job, err)
    }

    return this.markRunning(job, externalJobId)
  }

  private async markRunning(job: AnalysisJob, externalJobId: string): Promise<AnalysisJob> {
    await this.deps.jobStore.linkExternalId(externalJobId, job.id)

    const res = await this.deps.jobStore.update(job.id, (current) => {
      if (current.status !== "pending" || current.retryCount !== job.retryCount) return null

      const { lastError: _lastError, ...rest } = current

      return {
        ...rest,
        status: "running",
        externalJobId,
        updatedAt: this.deps.clock.now(),
      }
    })

    if (res.kind === "not_found") throw JobError.notFound(job.id)

    if (res.kind === "updated") {
      this.deps.logger.info("Analysis job accepted", {
        tenantId: job.tenantId,
        jobId: job.id,
        externalJobId,
      })
    }

    return res.job
  }

  private async handleDispatchFailure(job: AnalysisJob, err: unknown): Promise<AnalysisJob> {
    const reason = describeError(err)
    const isRetryable = err instanceof BaseError && err.isRetryable
    const log = this.deps.logger.child({ tenantId: job.tenantId, jobId: job.id })

    if (!isRetryable) {
      log.warn("Analysis submission rejected", { err })

      const result = await this.deps.coordinator.complete(
        { tenantId: job.tenantId, jobId: job.id },
        {
          status: "failed",
          source: "submitter",
          error: reason,
          output: { reason: "submission_rejected" },
        },
      )

      return result.outcome === "applied" ? result.job : job
    }

    log.warn("Analysis submission failed, will retry", { err })

    const res = await this.deps.jobStore.update(job.id, (current) =>
      current.status === "pending" && current.externalJobId === undefined
        ? { ...current, lastError: reason, updatedAt: this.deps.clock.now() }
        : null,
    )

    return res.kind === "not_found" ? job : res.job
  }
}
