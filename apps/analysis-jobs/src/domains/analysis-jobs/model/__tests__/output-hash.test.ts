import { describe, expect, it } from "vitest"
import { hashOutput } from "../output-hash"

describe("hashOutput", () => {
  it("produces a lowercase sha-256 hex digest", () => {
    expect(hashOutput({ booking_status: "booked" })).toMatch(/^[0-9a-f]{64}$/)
  })

  it("ignores key order at every depth", () => {
    const a = { score: 0.9, summary: { intent: "book", sentiment: "positive" } }
    const b = { summary: { sentiment: "positive", intent: "book" }, score: 0.9 }

    expect(hashOutput(a)).toBe(hashOutput(b))
  })

  it("ignores top-level delivery timestamps", () => {
    const first = { booking_status: "booked", processed_at: "2025-01-15T09:00:00Z" }
    const again = { booking_status: "booked", processed_at: "2025-01-15T09:05:00Z", timestamp: 1 }

    expect(hashOutput(first)).toBe(hashOutput(again))
    expect(hashOutput(first)).toBe(hashOutput({ booking_status: "booked" }))
  })

  it("keeps timestamps nested below the top level", () => {
    const a = { details: { processed_at: "2025-01-15T09:00:00Z" } }
    const b = { details: { processed_at: "2025-01-15T09:05:00Z" } }

    expect(hashOutput(a)).not.toBe(hashOutput(b))
  })

  it("changes when a value changes", () => {
    expect(hashOutput({ booking_status: "booked" })).not.toBe(
      hashOutput({ booking_status: "not_booked" }),
    )
  })

  it("keeps array order significant", () => {
    expect(hashOutput({ tags: ["a", "b"] })).not.toBe(hashOutput({ tags: ["b", "a"] }))
  })
})
