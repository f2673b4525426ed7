import type { Clock, Milliseconds } from "@conduit/clock"
import { type Lock, tryWithLock } from "@conduit/lock"
import type { Logger } from "@conduit/logger"
import type {
  CompletionCandidate,
  CompletionResult,
  JobRef,
} from "../model/completion.model"
import { JobError } from "../model/job.errors"
import type { CompletionListener } from "./completion-notifier"
import { decideCompletion } from "./decide-completion"
import type { JobMetrics } from "./job-metrics"
import type { JobStore } from "./job-store"

export type CompletionCoordinatorDeps = {
  clock: Clock
  logger: Logger
  lock: Lock
  jobStore: JobStore
  listener: CompletionListener
  metrics: JobMetrics
}

export type CompletionCoordinatorConfig = {
  /** Must outlast one read-decide-write round with margin. */
  lockTtlMs: Milliseconds

  /** Write attempts inside the lock when a non-terminal update races us. */
  maxWriteAttempts?: number
}

const DEFAULT_MAX_WRITE_ATTEMPTS = 5

/**
 * The only writer of terminal job state. Webhooks, the poller and the
 * supervisor all hand their signals here.
 *
 * @remarks
 * The per-job lock is taken without waiting: a busy lock means another path
 * is completing the job right now, and the caller simply drops its signal.
 * Inside the lock the record is re-read, so whichever signal commits first
 * wins and every later one sees `skipped_terminal`. Listeners run after the
 * write and only for `applied`.
 */
export class CompletionCoordinator {
  public constructor(
    private readonly deps: CompletionCoordinatorDeps,
    private readonly config: CompletionCoordinatorConfig,
  ) {}

  async complete(ref: JobRef, candidate: CompletionCandidate): Promise<CompletionResult> {
    const log = this.deps.logger.child({ jobId: ref.jobId, tenantId: ref.tenantId })

    const locked = await tryWithLock(
      this.deps.lock,
      ref.jobId,
      () => this.applyLocked(ref, candidate),
      { ttl: { milliseconds: this.config.lockTtlMs } },
    )

    const result: CompletionResult = locked ?? { outcome: "lock_busy" }

    this.deps.metrics.recordCompletion(candidate.source, result.outcome)

    if (result.outcome !== "applied") {
      log.debug("Completion skipped", {
        outcome: result.outcome,
        source: candidate.source,
        candidateStatus: candidate.status,
      })
      return result
    }

    log.info("Completion applied", {
      status: result.job.status,
      source: candidate.source,
      retryCount: result.job.retryCount,
    })

    await this.deps.listener.onApplied(result.job)

    return result
  }

  private async applyLocked(
    ref: JobRef,
    candidate: CompletionCandidate,
  ): Promise<CompletionResult> {
    const maxAttempts = this.config.maxWriteAttempts ?? DEFAULT_MAX_WRITE_ATTEMPTS

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const current = await this.deps.jobStore.getVersioned(ref.jobId)

      if (!current || current.job.tenantId !== ref.tenantId) {
        throw JobError.notFound(ref.jobId)
      }

      const decision = decideCompletion(current.job, candidate, this.deps.clock.now())

      if (decision.outcome !== "applied") return decision

      if (await this.deps.jobStore.replace(decision.job, current.version)) {
        return decision
      }
    }

    throw JobError.contention(ref.jobId)
  }
}
