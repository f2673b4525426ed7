import { beforeEach, describe, expect, it } from "vitest"
import { createJobTestbed, type JobTestbed } from "../../../../tests/job-testbed"
import { AnalysisClientError } from "../../model/analysis-client.model"
import type { SubmitJobInput } from "../../model/job.schema"

describe("JobSubmitter", () => {
  let bed: JobTestbed

  beforeEach(() => {
    bed = createJobTestbed()
  })

  const input = (overrides: Partial<SubmitJobInput> = {}): SubmitJobInput => ({
    tenantId: "t1",
    subjectId: "call-42",
    kind: "csr_call",
    input: { reference: "https://recordings.example.test/call-42.wav" },
    ...overrides,
  })

  describe("submit", () => {
    it("creates the job and hands it to the analysis service", async () => {
      const { job, created } = await bed.submitter.submit(input())

      expect(created).toBe(true)
      expect(job).toMatchObject({
        tenantId: "t1",
        subjectId: "call-42",
        kind: "csr_call",
        status: "running",
        externalJobId: "ext-1",
        retryCount: 0,
      })
      expect(bed.analysisClient.submissions).toEqual([
        {
          jobId: job.id,
          tenantId: "t1",
          subjectId: "call-42",
          kind: "csr_call",
          input: { reference: "https://recordings.example.test/call-42.wav" },
        },
      ])
      expect(await bed.jobStore.findByExternalId("ext-1")).toEqual(job)
    })

    it("returns the same job for a repeated submission without calling out again", async () => {
      const first = await bed.submitter.submit(input())
      const second = await bed.submitter.submit(input())

      expect(second.created).toBe(false)
      expect(second.job.id).toBe(first.job.id)
      expect(bed.analysisClient.submissions).toHaveLength(1)
      expect(bed.metrics.snapshot().submissions).toEqual({ created: 1, deduplicated: 1 })
    })

    it("makes one outbound call for concurrent identical submissions", async () => {
      const results = await Promise.all([
        bed.submitter.submit(input()),
        bed.submitter.submit(input()),
        bed.submitter.submit(input()),
      ])

      expect(new Set(results.map((r) => r.job.id)).size).toBe(1)
      expect(results.filter((r) => r.created)).toHaveLength(1)
      expect(bed.analysisClient.submissions).toHaveLength(1)
    })

    it("never answers one tenant with another tenant's job", async () => {
      const acme = await bed.submitter.submit(input({ tenantId: "acme", subjectId: "x:csr_call:y" }))
      const other = await bed.submitter.submit(
        input({ tenantId: "acme:csr_call:x", subjectId: "y" }),
      )

      expect(other.created).toBe(true)
      expect(other.job.id).not.toBe(acme.job.id)
      expect(other.job.tenantId).toBe("acme:csr_call:x")
      expect(bed.analysisClient.submissions).toHaveLength(2)
    })

    it("trims identifiers before deduplicating", async () => {
      const first = await bed.submitter.submit(input())
      const second = await bed.submitter.submit(input({ subjectId: "  call-42 " }))

      expect(second.job.id).toBe(first.job.id)
    })

    it("starts a new job after the previous one succeeded", async () => {
      const first = await bed.submitter.submit(input())
      await bed.coordinator.complete(
        { tenantId: "t1", jobId: first.job.id },
        { status: "succeeded", source: "webhook", externalJobId: "ext-1" },
      )

      const second = await bed.submitter.submit(input())

      expect(second.created).toBe(true)
      expect(second.job.id).not.toBe(first.job.id)
      expect(second.job.externalJobId).toBe("ext-2")
    })

    const invalidInputs: Array<[string, Partial<SubmitJobInput>, string]> = [
      ["an empty tenant", { tenantId: "  " }, "tenantId: tenantId cannot be empty"],
      [
        "a reference that is not a URL",
        { input: { reference: "call-42.wav" } },
        "input.reference: reference must be a URL the analysis service can fetch",
      ],
    ]

    it.each(invalidInputs)("rejects %s", async (_label, overrides, reason) => {
      await expect(bed.submitter.submit(input(overrides))).rejects.toMatchObject({
        code: "invalid_submission",
        context: { reason },
      })

      expect(await bed.jobStore.listActive()).toEqual([])
      expect(bed.analysisClient.submissions).toEqual([])
    })

    it("keeps the job pending with the error when the service is briefly unavailable", async () => {
      bed.analysisClient.failSubmissions(AnalysisClientError.unavailable(503), 1)

      const { job, created } = await bed.submitter.submit(input())

      expect(created).toBe(true)
      expect(job.status).toBe("pending")
      expect(job.externalJobId).toBeUndefined()
      expect(job.lastError).toBe("analysis_unavailable: Analysis service unavailable")
    })

    it("fails the job when the service rejects the submission", async () => {
      bed.analysisClient.failSubmissions(AnalysisClientError.rejected(422, "bad reference"), 1)

      const { job } = await bed.submitter.submit(input())

      expect(job).toMatchObject({
        status: "failed",
        output: { reason: "submission_rejected" },
        lastError: "analysis_rejected: Analysis service rejected the request (422)",
      })
      expect(bed.metrics.snapshot().completionsBySource.submitter).toBe(1)
    })
  })

  describe("dispatch", () => {
    it("does not move a job that left pending in the meantime", async () => {
      bed.analysisClient.failSubmissions(AnalysisClientError.unavailable(503), 1)
      const { job } = await bed.submitter.submit(input())

      await bed.coordinator.complete(
        { tenantId: "t1", jobId: job.id },
        { status: "timeout", source: "supervisor" },
      )

      const res = await bed.submitter.dispatch(job)

      expect(res.status).toBe("timeout")
      expect((await bed.jobStore.get("t1", job.id))?.externalJobId).toBeUndefined()
    })
  })
})
