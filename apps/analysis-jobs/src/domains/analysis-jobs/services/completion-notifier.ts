import type { Logger } from "@conduit/logger"
import type { AnalysisJob } from "../model/job.model"

/** Downstream effect of a job reaching a terminal state, e.g. updating CRM records. */
export interface CompletionListener {
  onApplied(job: AnalysisJob): Promise<void>
}

export type CompletionNotifierDeps = {
  logger: Logger
}

/**
 * Fans an applied completion out to subscribers. A failing subscriber is
 * logged and does not stop the others.
 */
export class CompletionNotifier implements CompletionListener {
  private readonly listeners = new Set<CompletionListener>()

  public constructor(private readonly deps: CompletionNotifierDeps) {}

  subscribe(listener: CompletionListener): () => void {
    this.listeners.add(listener)

    return () => {
      this.listeners.delete(listener)
    }
  }

  async onApplied(job: AnalysisJob): Promise<void> {
    for (const listener of this.listeners) {
      try {
        await listener.onApplied(job)
      } catch (err) {
        this.deps.logger.error("Completion listener failed", {
          err,
          jobId: job.id,
          tenantId: job.tenantId,
        })
      }
    }
  }
}
