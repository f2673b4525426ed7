import { createHash } from "node:crypto"
import type { JobPayload } from "./job.model"

/** Top-level fields that change on every delivery without changing the result. */
const VOLATILE_FIELDS = new Set(["processed_at", "created_at", "analyzed_at", "timestamp"])

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize)

  if (value instanceof Date) return value.toISOString()

  if (typeof value === "object" && value !== null) {
    const out: Record<string, unknown> = {}
    for (const key of Object.keys(value).sort()) {
      out[key] = canonicalize(Reflect.get(value, key))
    }
    return out
  }

  return value
}

/**
 * SHA-256 over the payload with sorted keys, ignoring delivery timestamps.
 * Two deliveries of the same analysis result hash the same.
 */
export function hashOutput(output: JobPayload): string {
  const stable = Object.fromEntries(
    Object.entries(output).filter(([key]) => !VOLATILE_FIELDS.has(key)),
  )

  return createHash("sha256").update(JSON.stringify(canonicalize(stable))).digest("hex")
}
