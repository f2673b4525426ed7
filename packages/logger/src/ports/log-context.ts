export type LogContext = {
  requestId: string

  ip: string
  method: string
  path: string
  status: number
  durationMs: number

  service: string
  module: string
  env: string

  tenantId: string
  jobId: string
  externalJobId: string
}

export type LogEvent = {
  err: unknown
}

/**
 * Per-call metadata. Known context keys are type-checked; anything else
 * is passed through to the log line as-is.
 */
export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>
