export type ErrorCode = Lowercase<string>

/** Structured metadata carried by an error (ids, inputs, upstream status). */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` if the same operation may succeed when attempted again. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad input, upstream outage),
   * `false` for programmer errors and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/** JSON-safe error shape for logs and API bodies. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  isRetryable: boolean
  cause?: SerializedError
  stack?: string
}>
