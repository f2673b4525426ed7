import type { Logger } from "@conduit/logger"
import { beforeEach, describe, expect, it, vi } from "vitest"
import { mock } from "vitest-mock-extended"
import type { Mock } from "../../../../tests/mock"
import { type AnalysisJob, JobId } from "../../model/job.model"
import { CompletionNotifier } from "../completion-notifier"

describe("CompletionNotifier", () => {
  const at = new Date(Date.UTC(2025, 0, 15, 9, 0, 0))
  const job: AnalysisJob = {
    id: JobId.generate(),
    tenantId: "t1",
    subjectId: "call-42",
    kind: "csr_call",
    status: "succeeded",
    externalJobId: "ext-1",
    input: { reference: "https://recordings.example.test/call-42.wav" },
    output: { booking_status: "booked" },
    retryCount: 0,
    attemptStartedAt: at,
    createdAt: at,
    updatedAt: at,
  }

  let logger: Mock<Logger>
  let notifier: CompletionNotifier

  beforeEach(() => {
    logger = mock<Logger>()
    notifier = new CompletionNotifier({ logger })
  })

  it("passes the job to every subscriber", async () => {
    const first = vi.fn(async (_job: AnalysisJob) => {})
    const second = vi.fn(async (_job: AnalysisJob) => {})
    notifier.subscribe({ onApplied: first })
    notifier.subscribe({ onApplied: second })

    await notifier.onApplied(job)

    expect(first).toHaveBeenCalledWith(job)
    expect(second).toHaveBeenCalledWith(job)
  })

  it("stops notifying after unsubscribe", async () => {
    const onApplied = vi.fn(async (_job: AnalysisJob) => {})
    const unsubscribe = notifier.subscribe({ onApplied })

    unsubscribe()
    await notifier.onApplied(job)

    expect(onApplied).not.toHaveBeenCalled()
  })

  it("logs a failing subscriber and still reaches the rest", async () => {
    const err = new Error("crm down")
    const after = vi.fn(async (_job: AnalysisJob) => {})
    notifier.subscribe({
      onApplied: async () => {
        throw err
      },
    })
    notifier.subscribe({ onApplied: after })

    await expect(notifier.onApplied(job)).resolves.toBeUndefined()

    expect(after).toHaveBeenCalledOnce()
    expect(logger.error).toHaveBeenCalledWith("Completion listener failed", {
      err,
      jobId: job.id,
      tenantId: "t1",
    })
  })
})
