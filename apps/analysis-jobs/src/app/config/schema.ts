import type { Milliseconds } from "@conduit/clock"
import { type LogLevelName, logLevelNames } from "@conduit/logger"
import { z } from "zod/mini"

export const jobStoreDrivers = ["redis", "memory"] as const
export type JobStoreDriver = (typeof jobStoreDrivers)[number]

export const webhookSignatureSchemes = ["ms-raw-body", "seconds-body-digest"] as const
export type WebhookSignatureScheme = (typeof webhookSignatureSchemes)[number]

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "Analysis Jobs"),
  SERVER_HOST: z._default(z.string(), "0.0.0.0"),

  SERVER_PORT: z._default(z.coerce.number(), 4680),
  SERVER_SHUTDOWN_TIMEOUT_MS: z._default(z.coerce.number(), 10_000),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  REQUEST_ID_ENABLED: z._default(z.stringbool(), true),
  REQUEST_ID_HEADER: z._default(z.string(), "x-request-id"),

  REQUEST_LOGGING_ENABLED: z._default(z.stringbool(), true),
  REQUEST_LOGGING_LEVEL: z._default(z.enum(logLevelNames), "info"),

  REDIS_URL: z._default(z.string(), "redis://localhost:6379"),
  REDIS_KEY_PREFIX: z._default(z.string(), "app:analysis-jobs"),

  JOB_STORE_DRIVER: z._default(z.enum(jobStoreDrivers), "redis"),

  ANALYSIS_API_URL: z._default(z.url(), "http://localhost:8090"),
  ANALYSIS_API_KEY: z.optional(z.string()),
  ANALYSIS_API_TIMEOUT_MS: z._default(z.coerce.number(), 10_000),
  ANALYSIS_CALLBACK_URL: z.optional(z.url()),

  WEBHOOK_SECRET: z.string().check(z.minLength(1, { error: "WEBHOOK_SECRET is required" })),
  WEBHOOK_SIGNATURE_TOLERANCE_MS: z._default(z.coerce.number(), 300_000),
  WEBHOOK_SIGNATURE_SCHEME: z._default(z.enum(webhookSignatureSchemes), "ms-raw-body"),

  JOB_MAX_RETRIES: z._default(z.coerce.number(), 3),
  JOB_MAX_LIFETIME_MS: z._default(z.coerce.number(), 3_600_000),
  JOB_POLL_INTERVAL_MS: z._default(z.coerce.number(), 30_000),
  JOB_POLL_BATCH_SIZE: z._default(z.coerce.number(), 100),
  JOB_LOCK_TTL_MS: z._default(z.coerce.number(), 10_000),
  JOB_RETRY_BASE_MS: z._default(z.coerce.number(), 5_000),
  JOB_RETRY_MAX_MS: z._default(z.coerce.number(), 300_000),
  JOB_SUPERVISOR_INTERVAL_MS: z._default(z.coerce.number(), 15_000),
  JOB_SWEEPERS_ENABLED: z._default(z.stringbool(), true),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
  }

  server: {
    host: string
    port: number
    shutdownTimeoutMs: Milliseconds
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  requestId: {
    enabled: boolean
    header: string
  }

  requestLogging: {
    enabled: boolean
    level: LogLevelName
  }

  redis: {
    url: string
    keyPrefix: string
  }

  analysisApi: {
    baseUrl: string
    apiKey?: string
    timeoutMs: Milliseconds
    callbackUrl?: string
  }

  webhooks: {
    secret: string
    signatureToleranceMs: Milliseconds
    signatureScheme: WebhookSignatureScheme
  }

  jobs: {
    storeDriver: JobStoreDriver
    maxRetries: number
    maxJobLifetimeMs: Milliseconds
    lockTtlMs: Milliseconds
    poller: {
      intervalMs: Milliseconds
      batchSize: number
    }
    supervisor: {
      intervalMs: Milliseconds
    }
    retryBackoff: {
      baseMs: Milliseconds
      maxMs: Milliseconds
    }
    sweepersEnabled: boolean
  }
}
