import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@conduit/config"
import { applyOverrides, type DeepPartial } from "@conduit/server"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
      shutdownTimeoutMs: env.SERVER_SHUTDOWN_TIMEOUT_MS,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    requestId: {
      enabled: env.REQUEST_ID_ENABLED,
      header: env.REQUEST_ID_HEADER,
    },
    requestLogging: {
      enabled: env.REQUEST_LOGGING_ENABLED,
      level: env.REQUEST_LOGGING_LEVEL,
    },
    redis: {
      url: env.REDIS_URL,
      keyPrefix: env.REDIS_KEY_PREFIX,
    },
    analysisApi: {
      baseUrl: env.ANALYSIS_API_URL,
      timeoutMs: env.ANALYSIS_API_TIMEOUT_MS,
      ...(env.ANALYSIS_API_KEY !== undefined && { apiKey: env.ANALYSIS_API_KEY }),
      ...(env.ANALYSIS_CALLBACK_URL !== undefined && { callbackUrl: env.ANALYSIS_CALLBACK_URL }),
    },
    webhooks: {
      secret: env.WEBHOOK_SECRET,
      signatureToleranceMs: env.WEBHOOK_SIGNATURE_TOLERANCE_MS,
      signatureScheme: env.WEBHOOK_SIGNATURE_SCHEME,
    },
    jobs: {
      storeDriver: env.JOB_STORE_DRIVER,
      maxRetries: env.JOB_MAX_RETRIES,
      maxJobLifetimeMs: env.JOB_MAX_LIFETIME_MS,
      lockTtlMs: env.JOB_LOCK_TTL_MS,
      poller: {
        intervalMs: env.JOB_POLL_INTERVAL_MS,
        batchSize: env.JOB_POLL_BATCH_SIZE,
      },
      supervisor: {
        intervalMs: env.JOB_SUPERVISOR_INTERVAL_MS,
      },
      retryBackoff: {
        baseMs: env.JOB_RETRY_BASE_MS,
        maxMs: env.JOB_RETRY_MAX_MS,
      },
      sweepersEnabled: env.JOB_SWEEPERS_ENABLED,
    },
  }
}

export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  overrides?: DeepPartial<AppConfig>,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${env.NODE_ENV ?? "development"}`, required: false, cwd }),
    new EnvSource({ env }),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  const config = mapEnvToConfig(result.value)

  return overrides ? applyOverrides(config, overrides) : config
}
