import type { Logger } from "@conduit/logger"
import { beforeEach, describe, expect, it } from "vitest"
import { mock } from "vitest-mock-extended"
import { createJobTestbed } from "../../../../tests/job-testbed"
import type { Mock } from "../../../../tests/mock"
import { type AnalysisJob, JobId } from "../../model/job.model"
import { JobEventLogger } from "../job-event-logger"

describe("JobEventLogger", () => {
  const at = new Date(Date.UTC(2025, 0, 15, 9, 0, 0))

  const job = (overrides: Partial<AnalysisJob> = {}): AnalysisJob => ({
    id: JobId.generate(),
    tenantId: "t1",
    subjectId: "call-42",
    kind: "csr_call",
    status: "succeeded",
    externalJobId: "ext-1",
    input: { reference: "https://recordings.example.test/call-42.wav" },
    output: { booking_status: "booked" },
    outputHash: "hash-1",
    retryCount: 0,
    attemptStartedAt: at,
    createdAt: at,
    updatedAt: at,
    ...overrides,
  })

  let logger: Mock<Logger>
  let events: JobEventLogger

  beforeEach(() => {
    logger = mock<Logger>()
    events = new JobEventLogger({ logger })
  })

  it("emits a succeeded event with the job's identity", async () => {
    const done = job()

    await events.onApplied(done)

    expect(logger.info).toHaveBeenCalledWith("analysis.job.succeeded", {
      event: "analysis.job.succeeded",
      jobId: done.id,
      tenantId: "t1",
      subjectId: "call-42",
      kind: "csr_call",
      retryCount: 0,
      externalJobId: "ext-1",
      outputHash: "hash-1",
    })
  })

  it("carries the error of a failed job", async () => {
    const { output: _output, outputHash: _outputHash, ...base } = job()
    const failed: AnalysisJob = {
      ...base,
      status: "failed",
      lastError: "audio unreadable",
      retryCount: 2,
    }

    await events.onApplied(failed)

    expect(logger.info).toHaveBeenCalledWith("analysis.job.failed", {
      event: "analysis.job.failed",
      jobId: failed.id,
      tenantId: "t1",
      subjectId: "call-42",
      kind: "csr_call",
      retryCount: 2,
      externalJobId: "ext-1",
      error: "audio unreadable",
    })
  })

  it("stays quiet for jobs that are still active", async () => {
    const { output: _output, outputHash: _outputHash, ...base } = job()

    await events.onApplied({ ...base, status: "running" })

    expect(logger.info).not.toHaveBeenCalled()
  })

  it("emits once per applied completion and not for redeliveries", async () => {
    const bed = createJobTestbed()
    bed.notifier.subscribe(events)

    const { job: submitted } = await bed.submitter.submit({
      tenantId: "t1",
      subjectId: "call-42",
      kind: "csr_call",
      input: { reference: "https://recordings.example.test/call-42.wav" },
    })
    const ref = { tenantId: "t1", jobId: submitted.id }

    await bed.coordinator.complete(ref, { status: "timeout", source: "supervisor" })
    await bed.coordinator.complete(ref, { status: "timeout", source: "supervisor" })

    expect(logger.info).toHaveBeenCalledOnce()
    expect(logger.info).toHaveBeenCalledWith(
      "analysis.job.timeout",
      expect.objectContaining({ jobId: submitted.id, tenantId: "t1" }),
    )
  })
})
