import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Structural check, so errors raised by another copy of this package
 * are still recognised.
 */
export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error) || !isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    e.timestamp instanceof Date &&
    Number.isFinite(e.timestamp.valueOf())
  )
}
