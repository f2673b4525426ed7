import { describe, expect, it } from "vitest"
import { toCompletionCandidate } from "../completion.model"

describe("toCompletionCandidate", () => {
  it("yields nothing while the job is in flight", () => {
    expect(toCompletionCandidate({ kind: "in_flight" }, "poller", "ext-1")).toBeNull()
  })

  it("maps success with its output", () => {
    expect(
      toCompletionCandidate({ kind: "succeeded", output: { score: 1 } }, "webhook", "ext-1"),
    ).toEqual({ status: "succeeded", source: "webhook", output: { score: 1 }, externalJobId: "ext-1" })
  })

  it("maps failure with the reported error", () => {
    expect(toCompletionCandidate({ kind: "failed", error: "bad audio" }, "poller", "ext-1")).toEqual(
      { status: "failed", source: "poller", error: "bad audio", externalJobId: "ext-1" },
    )
  })

  it("fails a job the service no longer knows, with a synthetic output", () => {
    expect(toCompletionCandidate({ kind: "not_found" }, "poller", "ext-7")).toEqual({
      status: "failed",
      source: "poller",
      error: "External job not found",
      output: { reason: "external_job_not_found", external_job_id: "ext-7" },
      externalJobId: "ext-7",
    })
  })
})
