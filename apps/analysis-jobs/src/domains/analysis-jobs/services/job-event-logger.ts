import type { Logger } from "@conduit/logger"
import { type AnalysisJob, isTerminal } from "../model/job.model"
import type { CompletionListener } from "./completion-notifier"

export type JobEventLoggerDeps = {
  logger: Logger
}

/**
 * Emits one structured `analysis.job.<status>` record per applied completion,
 * for log shippers to forward to downstream consumers.
 */
export class JobEventLogger implements CompletionListener {
  public constructor(private readonly deps: JobEventLoggerDeps) {}

  async onApplied(job: AnalysisJob): Promise<void> {
    if (!isTerminal(job.status)) return

    const event = `analysis.job.${job.status}`

    this.deps.logger.info(event, {
      event,
      jobId: job.id,
      tenantId: job.tenantId,
      subjectId: job.subjectId,
      kind: job.kind,
      retryCount: job.retryCount,
      ...(job.externalJobId !== undefined && { externalJobId: job.externalJobId }),
      ...(job.outputHash !== undefined && { outputHash: job.outputHash }),
      ...(job.lastError !== undefined && { error: job.lastError }),
    })
  }
}
