import type { JobPayload } from "./job.model"

/** What the analysis service says about one of its jobs. */
export type ExternalJobState =
  | { kind: "in_flight" }
  | { kind: "succeeded"; output: JobPayload }
  | { kind: "failed"; output?: JobPayload; error: string }
  | { kind: "not_found" }

export type ExternalStatusKind = ExternalJobState["kind"]

const STATUS_MAP: Readonly<Record<string, ExternalStatusKind>> = {
  completed: "succeeded",
  succeeded: "succeeded",
  success: "succeeded",
  failed: "failed",
  error: "failed",
  not_found: "not_found",
  expired: "not_found",
}

/** Unknown or missing statuses count as still running. */
export function mapExternalStatus(status: string | undefined): ExternalStatusKind {
  if (status === undefined) return "in_flight"

  return STATUS_MAP[status.trim().toLowerCase()] ?? "in_flight"
}

const EXTERNAL_ID_FIELDS = ["external_job_id", "job_id", "task_id", "transcript_id", "id"]

/** The service names its job id differently per endpoint. */
export function extractExternalJobId(body: Record<string, unknown>): string | undefined {
  for (const field of EXTERNAL_ID_FIELDS) {
    const value = body[field]

    if (typeof value === "number" && Number.isFinite(value)) return String(value)
    if (typeof value === "string" && value.trim() !== "") return value.trim()
  }

  return undefined
}

function asPayload(value: unknown): JobPayload | undefined {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined
}

/**
 * Builds the state from a status body. The result may sit under `output` or
 * `result`; a failure reason under `error` or `error_message`.
 */
export function toExternalJobState(body: Record<string, unknown>): ExternalJobState {
  const rawStatus = body.status ?? body.processing_status
  const kind = mapExternalStatus(typeof rawStatus === "string" ? rawStatus : undefined)
  const output = asPayload(body.output) ?? asPayload(body.result)

  switch (kind) {
    case "in_flight":
      return { kind }
    case "not_found":
      return { kind }
    case "succeeded":
      return { kind, output: output ?? {} }
    case "failed": {
      const reason = body.error ?? body.error_message
      return {
        kind,
        error: typeof reason === "string" && reason !== "" ? reason : "Analysis failed",
        ...(output !== undefined && { output }),
      }
    }
  }
}
