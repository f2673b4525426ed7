import { createRedisClient, type RedisBytesClient } from "@conduit/kv"
import { HttpAnalysisClient } from "../../domains/analysis-jobs/infra/analysis-client.http"
import type { AnalysisClient } from "../../domains/analysis-jobs/model/analysis-client.model"
import type { AppConfig } from "../config"

export type InfraClients = {
  redisClient: RedisBytesClient
  analysisClient: AnalysisClient
}

export function createDefaultInfraClients(config: AppConfig): InfraClients {
  const redisClient = createRedisClient({
    url: config.redis.url,
  })

  const analysisClient = new HttpAnalysisClient(
    {},
    {
      baseUrl: config.analysisApi.baseUrl,
      timeoutMs: config.analysisApi.timeoutMs,
      ...(config.analysisApi.apiKey !== undefined && { apiKey: config.analysisApi.apiKey }),
      ...(config.analysisApi.callbackUrl !== undefined && {
        callbackUrl: config.analysisApi.callbackUrl,
      }),
    },
  )

  return { redisClient, analysisClient }
}
