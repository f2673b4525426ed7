import type { Application } from "@conduit/server"
import { beforeEach, describe, expect, it, vi } from "vitest"
import {
  createTestHarness,
  signedWebhookHeaders,
  TEST_WEBHOOK_SECRET,
  type TestHarness,
} from "../../../../tests/test-harness"
import type { AnalysisJobServices } from "../../composition"
import type { AnalysisJob } from "../../model/job.model"
import { JobEventLogger } from "../../services/job-event-logger"
import type { JobMetricsSnapshot } from "../../services/job-metrics"
import type { WebhookResponse } from "../analysis-webhook.handler"
import type { JobView } from "../job.view"

type ApiResponse<T> = {
  status: number
  body: T | null
}

type ErrorBody = {
  error: { code: string; status: number; message: string; details?: string }
}

describe("Analysis jobs API", () => {
  let harness: TestHarness
  let app: Application
  let jobs: AnalysisJobServices

  beforeEach(async () => {
    harness = await createTestHarness()
    await harness.lifecycle.start()
    app = harness.app
    jobs = harness.ctx.services.domains.analysisJobs
  })

  const parseBody = async <T>(res: Response): Promise<T | null> => {
    if (res.headers.get("content-type")?.includes("application/json")) {
      return res.json() as Promise<T>
    }

    return null
  }

  const callRecording = {
    subject_id: "call-42",
    job_kind: "csr_call",
    input: { reference: "https://recordings.example.test/call-42.wav" },
  }

  const postJob = async <T = JobView>(
    body: unknown,
    tenantId: string | null = "t1",
  ): Promise<ApiResponse<T>> => {
    const res = await app.request("/api/v1/jobs", {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...(tenantId !== null && { "x-tenant-id": tenantId }),
      },
      body: JSON.stringify(body),
    })
    return { status: res.status, body: await parseBody<T>(res) }
  }

  const getJob = async <T = JobView>(id: string, tenantId = "t1"): Promise<ApiResponse<T>> => {
    const res = await app.request(`/api/v1/jobs/${id}`, {
      method: "GET",
      headers: { "x-tenant-id": tenantId },
    })
    return { status: res.status, body: await parseBody<T>(res) }
  }

  const postWebhook = async <T = WebhookResponse>(
    payload: Record<string, unknown> | string,
    headers: Record<string, string> | ((body: string) => Record<string, string>) = (body) =>
      signedWebhookHeaders(body, harness.clock.nowMs()),
  ): Promise<ApiResponse<T>> => {
    const body = typeof payload === "string" ? payload : JSON.stringify(payload)
    const res = await app.request("/api/v1/webhooks/analysis", {
      method: "POST",
      headers: typeof headers === "function" ? headers(body) : headers,
      body,
    })
    return { status: res.status, body: await parseBody<T>(res) }
  }

  const submitCall = async (): Promise<JobView> => {
    const { status, body } = await postJob(callRecording)
    expect(status).toBe(201)
    if (!body) throw new Error("expected a job in the response")
    return body
  }

  const statusOf = async (id: string) => (await getJob(id)).body?.status

  describe("booking call end to end", () => {
    it("submits once, applies the webhook and skips the redelivery", async () => {
      const onApplied = vi.fn(async (_job: AnalysisJob) => {})
      jobs.notifier.subscribe({ onApplied })

      const first = await postJob(callRecording)
      const second = await postJob(callRecording)

      expect(first.status).toBe(201)
      expect(second.status).toBe(200)
      expect(first.body).toMatchObject({
        tenantId: "t1",
        subjectId: "call-42",
        kind: "csr_call",
        status: "running",
        externalJobId: "ext-1",
        output: null,
        retryCount: 0,
        retriesExhausted: false,
        createdAt: "2025-01-15T09:00:00.000Z",
      })
      expect(second.body?.id).toBe(first.body?.id)
      expect(harness.analysisClient.submissions).toHaveLength(1)

      const jobId = first.body?.id
      const notification = {
        job_id: "ext-1",
        tenant_id: "t1",
        status: "succeeded",
        output: { booking_status: "booked" },
      }

      const delivered = await postWebhook(notification)
      expect(delivered).toEqual({ status: 200, body: { outcome: "applied", jobId } })

      const redelivered = await postWebhook(notification)
      expect(redelivered).toEqual({ status: 200, body: { outcome: "skipped_terminal", jobId } })

      const read = await getJob(jobId ?? "")
      expect(read.status).toBe(200)
      expect(read.body).toMatchObject({
        status: "succeeded",
        output: { booking_status: "booked" },
        lastError: null,
      })
      expect(onApplied).toHaveBeenCalledOnce()
    })
  })

  describe("POST /api/v1/jobs", () => {
    it("requires a tenant", async () => {
      const { status, body } = await postJob<ErrorBody>(callRecording, null)

      expect(status).toBe(400)
      expect(body?.error.code).toBe("tenant_required")
      expect(harness.analysisClient.submissions).toEqual([])
    })

    it("rejects an unknown job kind", async () => {
      const { status, body } = await postJob<ErrorBody>({ ...callRecording, job_kind: "podcast" })

      expect(status).toBe(400)
      expect(body?.error.code).toBe("validation_error")
    })

    it("rejects a reference the service cannot fetch", async () => {
      const { status, body } = await postJob<ErrorBody>({
        ...callRecording,
        input: { reference: "call-42.wav" },
      })

      expect(status).toBe(400)
      expect(body?.error).toMatchObject({
        code: "invalid_submission",
        message: "Invalid job submission",
        details:
          "Invalid submission: input.reference: reference must be a URL the analysis service can fetch",
      })
    })

    it("keeps tenants apart", async () => {
      const ours = await postJob(callRecording, "t1")
      const theirs = await postJob(callRecording, "t2")

      expect(theirs.status).toBe(201)
      expect(theirs.body?.id).not.toBe(ours.body?.id)
      expect(harness.analysisClient.submissions).toHaveLength(2)
    })
  })

  describe("GET /api/v1/jobs/:id", () => {
    it("hides jobs of other tenants", async () => {
      const job = await submitCall()

      expect((await getJob(job.id, "t2")).status).toBe(404)
      expect((await getJob(job.id, "t1")).status).toBe(200)
    })

    it("answers 404 for ids that are not job ids", async () => {
      expect((await getJob("not-a-job")).status).toBe(404)
    })
  })

  describe("POST /api/v1/webhooks/analysis", () => {
    const succeeded = { job_id: "ext-1", status: "succeeded", output: { score: 0.9 } }

    const unauthentic: Array<[string, (body: string) => Record<string, string>]> = [
      [
        "a wrong signature",
        (body) => signedWebhookHeaders(body, harness.clock.nowMs(), "other-secret"),
      ],
      [
        "an expired timestamp",
        (body) => signedWebhookHeaders(body, harness.clock.nowMs() - 300_001),
      ],
      ["no signature headers", () => ({ "content-type": "application/json" })],
    ]

    it.each(unauthentic)("rejects %s without touching the job", async (_label, headers) => {
      const job = await submitCall()

      const { status, body } = await postWebhook<ErrorBody>(succeeded, headers)

      expect(status).toBe(401)
      expect(body?.error.code).toBe("webhook_rejected")
      expect(await statusOf(job.id)).toBe("running")
      expect(jobs.metrics.snapshot().completions).toEqual({
        applied: 0,
        skipped_duplicate: 0,
        skipped_terminal: 0,
        lock_busy: 0,
      })
    })

    it("accepts a timestamp inside the tolerance window", async () => {
      await submitCall()

      const { body } = await postWebhook(succeeded, (raw) =>
        signedWebhookHeaders(raw, harness.clock.nowMs() - 300_000),
      )

      expect(body?.outcome).toBe("applied")
    })

    it("verifies the seconds-body-digest scheme when configured", async () => {
      harness = await createTestHarness({ env: { WEBHOOK_SIGNATURE_SCHEME: "seconds-body-digest" } })
      await harness.lifecycle.start()
      app = harness.app
      jobs = harness.ctx.services.domains.analysisJobs
      await submitCall()

      const overRawBody = await postWebhook<ErrorBody>(succeeded, (raw) =>
        signedWebhookHeaders(raw, harness.clock.nowMs()),
      )
      expect(overRawBody.status).toBe(401)

      const { body } = await postWebhook(succeeded, (raw) =>
        signedWebhookHeaders(raw, harness.clock.nowMs(), TEST_WEBHOOK_SECRET, "seconds-body-digest"),
      )
      expect(body?.outcome).toBe("applied")
    })

    it("publishes one job event per applied completion", async () => {
      const published = vi.spyOn(JobEventLogger.prototype, "onApplied")
      const job = await submitCall()

      await postWebhook(succeeded)
      await postWebhook(succeeded)

      expect(published).toHaveBeenCalledOnce()
      expect(published.mock.calls[0]?.[0]).toMatchObject({ id: job.id, status: "succeeded" })
    })

    it("refuses a notification naming another tenant", async () => {
      const job = await submitCall()

      const { status, body } = await postWebhook<ErrorBody>({ ...succeeded, tenant_id: "t2" })

      expect(status).toBe(403)
      expect(body?.error.code).toBe("tenant_mismatch")
      expect(await statusOf(job.id)).toBe("running")
    })

    it("acknowledges notifications for unknown jobs", async () => {
      const { status, body } = await postWebhook({ ...succeeded, job_id: "ext-999" })

      expect(status).toBe(200)
      expect(body).toEqual({ outcome: "ignored", reason: "unknown_job" })
    })

    it("ignores progress notifications", async () => {
      const job = await submitCall()

      const { body } = await postWebhook({ job_id: "ext-1", status: "processing" })

      expect(body).toEqual({ outcome: "ignored", reason: "not_terminal", jobId: job.id })
    })

    it("records a reported failure", async () => {
      const job = await submitCall()

      await postWebhook({ job_id: "ext-1", status: "failed", error: "audio unreadable" })

      expect((await getJob(job.id)).body).toMatchObject({
        status: "failed",
        lastError: "audio unreadable",
      })
    })

    it("rejects a signed body that is not JSON", async () => {
      const { status, body } = await postWebhook<ErrorBody>("not json")

      expect(status).toBe(400)
      expect(body?.error.code).toBe("invalid_webhook")
    })

    it("rejects a notification without a job id", async () => {
      const { status, body } = await postWebhook<ErrorBody>({ status: "succeeded" })

      expect(status).toBe(400)
      expect(body?.error.code).toBe("invalid_webhook")
    })
  })

  describe("background recovery", () => {
    it("completes a job through polling when its webhook is lost", async () => {
      const job = await submitCall()
      harness.analysisClient.setState("ext-1", {
        kind: "succeeded",
        output: { booking_status: "booked" },
      })

      harness.clock.advance(harness.ctx.config.jobs.poller.intervalMs)
      await jobs.poller.sweep()

      expect((await getJob(job.id)).body).toMatchObject({
        status: "succeeded",
        output: { booking_status: "booked" },
      })
    })

    it("answers a webhook after a timeout with skipped_terminal", async () => {
      const job = await submitCall()

      harness.clock.advance(harness.ctx.config.jobs.maxJobLifetimeMs + 1)
      await jobs.supervisor.sweep()

      const { body } = await postWebhook(succeeded)

      expect(body).toEqual({ outcome: "skipped_terminal", jobId: job.id })
      expect((await getJob(job.id)).body?.status).toBe("timeout")
    })
  })

  it("reports job metrics", async () => {
    await submitCall()
    await postJob(callRecording)

    const res = await app.request("/api/v1/metrics/jobs")
    const body = await parseBody<JobMetricsSnapshot>(res)

    expect(res.status).toBe(200)
    expect(body?.submissions).toEqual({ created: 1, deduplicated: 1 })
  })
})
