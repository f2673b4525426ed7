import { type AppError, type ErrorCode, isAppError } from "@conduit/errors"
import type { StatusCode } from "../http/status-codes"

export type ErrorMapping = {
  status: StatusCode

  /** User-facing; must not leak internals. */
  message: string
}

export type FallbackMapping = ErrorMapping & {
  code: ErrorCode
}

export interface ErrorMappingsConfig {
  /**
   * Unmapped AppErrors keep their code but take the fallback status and message.
   */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>

  fallback?: FallbackMapping

  /**
   * Extra fields to expose from an error's context. Return undefined to
   * expose none.
   */
  transformContext?: (error: AppError) => Record<string, unknown> | undefined
}

export type ErrorResponseBody = {
  status: StatusCode
  code: ErrorCode
  message: string
  requestId: string
  [key: string]: unknown
}

export type ErrorResponse = {
  error: ErrorResponseBody
}

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
}

export function createErrorFormatter(config: ErrorMappingsConfig): ErrorFormatter {
  const fallback = config.fallback ?? DEFAULT_FALLBACK

  return (error, requestId) => {
    if (!isAppError(error)) {
      return {
        error: {
          code: fallback.code,
          status: fallback.status,
          message: fallback.message,
          requestId,
        },
      }
    }

    const mapping = config.mappings[error.code]

    return {
      error: {
        ...config.transformContext?.(error),
        code: error.code,
        status: mapping?.status ?? fallback.status,
        message: mapping?.message ?? fallback.message,
        requestId,
      },
    }
  }
}
