import { beforeEach, describe, expect, it, vi } from "vitest"
import { createJobTestbed, type JobTestbed } from "../../../../tests/job-testbed"
import { AnalysisClientError } from "../../model/analysis-client.model"
import type { AnalysisJob, JobPayload } from "../../model/job.model"
import type { SupervisorSweepResult } from "../retry-supervisor"

const idle: SupervisorSweepResult = {
  timedOut: 0,
  scheduled: 0,
  retried: 0,
  exhausted: 0,
  errors: 0,
}

describe("RetrySupervisor", () => {
  const maxJobLifetimeMs = 60 * 60_000

  let bed: JobTestbed

  beforeEach(() => {
    bed = createJobTestbed({ maxRetries: 3, maxJobLifetimeMs, retryBaseMs: 1_000 })
  })

  const submit = async (subjectId = "call-42"): Promise<AnalysisJob> => {
    const { job } = await bed.submitter.submit({
      tenantId: "t1",
      subjectId,
      kind: "csr_call",
      input: { reference: `https://recordings.example.test/${subjectId}.wav` },
    })
    return job
  }

  const failViaWebhook = (job: AnalysisJob, output?: JobPayload) =>
    bed.coordinator.complete(
      { tenantId: job.tenantId, jobId: job.id },
      {
        status: "failed",
        source: "webhook",
        error: "audio unreadable",
        externalJobId: bed.analysisClient.lastExternalJobId(),
        ...(output !== undefined && { output }),
      },
    )

  const load = async (job: AnalysisJob) => {
    const current = await bed.jobStore.get(job.tenantId, job.id)
    if (!current) throw new Error(`job ${job.id} vanished`)
    return current
  }

  describe("lifetime", () => {
    it("times out a job that outlives its attempt", async () => {
      const job = await submit()

      bed.clock.advance(maxJobLifetimeMs)
      expect(await bed.supervisor.sweep()).toEqual(idle)

      bed.clock.advance(1)
      expect(await bed.supervisor.sweep()).toEqual({ ...idle, timedOut: 1 })

      expect(await load(job)).toMatchObject({
        status: "timeout",
        lastError: "Job exceeded its lifetime of 3600000ms",
      })
      expect(bed.metrics.snapshot().timeouts).toBe(1)
    })

    it("ignores a webhook that arrives after the timeout", async () => {
      const job = await submit()
      const onApplied = vi.fn(async (_job: AnalysisJob) => {})
      bed.notifier.subscribe({ onApplied })

      bed.clock.advance(maxJobLifetimeMs + 1)
      await bed.supervisor.sweep()

      const late = await bed.coordinator.complete(
        { tenantId: "t1", jobId: job.id },
        {
          status: "succeeded",
          source: "webhook",
          output: { booking_status: "booked" },
          externalJobId: "ext-1",
        },
      )

      expect(late).toEqual({ outcome: "skipped_terminal" })
      expect((await load(job)).status).toBe("timeout")
      expect(onApplied).toHaveBeenCalledTimes(1)
    })

    it("measures the lifetime from the start of the current attempt", async () => {
      const job = await submit()
      await failViaWebhook(job)

      bed.clock.advance(maxJobLifetimeMs - 10_000)
      await bed.supervisor.sweep()
      bed.clock.advance(1_000)
      await bed.supervisor.sweep()

      bed.clock.advance(maxJobLifetimeMs)
      expect(await bed.supervisor.sweep()).toEqual(idle)
      expect((await load(job)).status).toBe("running")
    })
  })

  describe("retries", () => {
    it("schedules a retry with backoff and runs it once due", async () => {
      const job = await submit()
      await failViaWebhook(job)

      expect(await bed.supervisor.sweep()).toEqual({ ...idle, scheduled: 1 })
      expect((await load(job)).nextAttemptAt).toEqual(new Date(bed.clock.nowMs() + 1_000))

      bed.clock.advance(999)
      expect(await bed.supervisor.sweep()).toEqual(idle)

      bed.clock.advance(1)
      expect(await bed.supervisor.sweep()).toEqual({ ...idle, retried: 1 })

      const retried = await load(job)
      expect(retried).toMatchObject({
        id: job.id,
        status: "running",
        externalJobId: "ext-2",
        retryCount: 1,
        attemptStartedAt: new Date(bed.clock.nowMs()),
      })
      expect(retried.lastError).toBeUndefined()
      expect(retried.nextAttemptAt).toBeUndefined()
      expect(bed.analysisClient.submissions.map((s) => s.jobId)).toEqual([job.id, job.id])
    })

    it("doubles the delay for each retry", async () => {
      const job = await submit()
      await failViaWebhook(job)
      await bed.supervisor.sweep()
      bed.clock.advance(1_000)
      await bed.supervisor.sweep()

      await failViaWebhook(job)
      await bed.supervisor.sweep()

      expect((await load(job)).nextAttemptAt).toEqual(new Date(bed.clock.nowMs() + 2_000))
    })

    it("clears the previous attempt's output", async () => {
      const job = await submit()
      await failViaWebhook(job, { partial: true })
      expect((await load(job)).output).toEqual({ partial: true })

      await bed.supervisor.sweep()
      bed.clock.advance(1_000)
      await bed.supervisor.sweep()

      expect((await load(job)).output).toBeUndefined()
    })

    it("drops a webhook for an attempt the job has moved past", async () => {
      const job = await submit()
      await failViaWebhook(job)
      await bed.supervisor.sweep()
      bed.clock.advance(1_000)
      await bed.supervisor.sweep()

      const stale = await bed.coordinator.complete(
        { tenantId: "t1", jobId: job.id },
        { status: "succeeded", source: "webhook", output: {}, externalJobId: "ext-1" },
      )

      expect(stale).toEqual({ outcome: "skipped_duplicate" })
      expect((await load(job)).status).toBe("running")
    })

    it("retries a submission the service never accepted", async () => {
      bed.analysisClient.failSubmissions(AnalysisClientError.unavailable(503), 1)
      const job = await submit()

      expect(await bed.supervisor.sweep()).toEqual({ ...idle, scheduled: 1 })
      bed.clock.advance(1_000)
      expect(await bed.supervisor.sweep()).toEqual({ ...idle, retried: 1 })

      expect(await load(job)).toMatchObject({
        status: "running",
        externalJobId: "ext-1",
        retryCount: 1,
      })
    })
  })

  describe("exhaustion", () => {
    it("stops after the last retry when submissions keep failing", async () => {
      bed.analysisClient.failSubmissions(AnalysisClientError.unavailable(503), 4)
      const job = await submit()

      for (const delayMs of [1_000, 2_000, 4_000]) {
        expect(await bed.supervisor.sweep()).toEqual({ ...idle, scheduled: 1 })
        bed.clock.advance(delayMs)
        expect(await bed.supervisor.sweep()).toEqual({ ...idle, retried: 1 })
      }

      expect(await bed.supervisor.sweep()).toEqual({ ...idle, exhausted: 1 })
      expect(await bed.supervisor.sweep()).toEqual(idle)

      expect(await load(job)).toMatchObject({
        status: "failed",
        retryCount: 3,
        lastError: "analysis_unavailable: Analysis service unavailable",
        exhaustedAt: new Date(bed.clock.nowMs()),
      })
      expect(bed.analysisClient.submissions).toHaveLength(4)
      expect(bed.metrics.snapshot()).toMatchObject({
        retries: 3,
        exhausted: 1,
        completionsBySource: { supervisor: 1 },
      })
    })

    it("stops after the last retry when every attempt fails", async () => {
      const job = await submit()
      const results: SupervisorSweepResult[] = []

      for (let attempt = 0; attempt <= 3; attempt++) {
        await failViaWebhook(await load(job))
        results.push(await bed.supervisor.sweep())
        bed.clock.advance(60_000)
        results.push(await bed.supervisor.sweep())
      }

      expect(results).toEqual([
        { ...idle, scheduled: 1 },
        { ...idle, retried: 1 },
        { ...idle, scheduled: 1 },
        { ...idle, retried: 1 },
        { ...idle, scheduled: 1 },
        { ...idle, retried: 1 },
        { ...idle, exhausted: 1 },
        idle,
      ])
      expect(await load(job)).toMatchObject({
        status: "failed",
        retryCount: 3,
        lastError: "audio unreadable",
      })
      expect(await bed.jobStore.listActive()).toEqual([])
      expect(bed.analysisClient.submissions).toHaveLength(4)
    })

    it("lets a new submission through once retries are exhausted", async () => {
      bed = createJobTestbed({ maxRetries: 0 })
      const job = await submit()
      await failViaWebhook(job)

      expect(await bed.supervisor.sweep()).toEqual({ ...idle, exhausted: 1 })

      const again = await bed.submitter.submit({
        tenantId: "t1",
        subjectId: "call-42",
        kind: "csr_call",
        input: { reference: "https://recordings.example.test/call-42.wav" },
      })

      expect(again.created).toBe(true)
      expect(again.job.id).not.toBe(job.id)
    })
  })

  it("keeps going when one job cannot be supervised", async () => {
    const first = await submit("call-1")
    const second = await submit("call-2")
    bed.clock.advance(maxJobLifetimeMs + 1)

    vi.spyOn(bed.coordinator, "complete").mockRejectedValueOnce(new Error("lock backend down"))

    expect(await bed.supervisor.sweep()).toEqual({ ...idle, timedOut: 1, errors: 1 })
    expect((await load(first)).status).toBe("running")
    expect((await load(second)).status).toBe("timeout")
  })
})
