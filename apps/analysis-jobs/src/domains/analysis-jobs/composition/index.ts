import { randomUUID } from "node:crypto"
import { createBackoff, exponential, proportionalJitter } from "@conduit/backoff"
import type { Clock } from "@conduit/clock"
import {
  createMemoryKeyValueStore,
  createRedisKeyValueStore,
  type KeyValueStore,
} from "@conduit/kv"
import { type Lock, MemoryLock, RedisLock } from "@conduit/lock"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraClients } from "../../../app/services/infra"
import { createJsonCodec } from "../../../lib/codec"
import {
  externalIdsKeyspace,
  jobClaimsKeyspace,
  jobLocksKeyspace,
  jobsIndexKeyspace,
  jobsKeyspace,
} from "../keyspace"
import type { AnalysisJob } from "../model/job.model"
import { CompletionCoordinator } from "../services/completion-coordinator"
import { CompletionNotifier } from "../services/completion-notifier"
import { JobEventLogger } from "../services/job-event-logger"
import { JobMetrics } from "../services/job-metrics"
import { JobPoller } from "../services/job-poller"
import { type JobClaim, type JobIndex, JobStore } from "../services/job-store"
import { JobSubmitter } from "../services/job-submitter"
import { RetrySupervisor } from "../services/retry-supervisor"
import { SignatureVerifier } from "../services/signature-verifier"
import { SweepLoop } from "../services/sweep-loop"

export type AnalysisJobServices = {
  clock: Clock
  jobStore: JobStore
  submitter: JobSubmitter
  verifier: SignatureVerifier
  coordinator: CompletionCoordinator
  notifier: CompletionNotifier
  poller: JobPoller
  supervisor: RetrySupervisor
  metrics: JobMetrics
  pollerLoop: SweepLoop
  supervisorLoop: SweepLoop
}

type Storage = {
  jobKv: KeyValueStore<AnalysisJob>
  claimKv: KeyValueStore<JobClaim>
  externalIdKv: KeyValueStore<JobClaim>
  indexKv: KeyValueStore<JobIndex>
  lock: Lock
}

function createRedisStorage(config: AppConfig, infra: InfraClients): Storage {
  const prefix = config.redis.keyPrefix
  const client = infra.redisClient

  return {
    jobKv: createRedisKeyValueStore({
      client,
      codec: createJsonCodec<AnalysisJob>(),
      opts: { keyspacePrefix: jobsKeyspace(prefix) },
    }),
    claimKv: createRedisKeyValueStore({
      client,
      codec: createJsonCodec<JobClaim>(),
      opts: { keyspacePrefix: jobClaimsKeyspace(prefix) },
    }),
    externalIdKv: createRedisKeyValueStore({
      client,
      codec: createJsonCodec<JobClaim>(),
      opts: { keyspacePrefix: externalIdsKeyspace(prefix) },
    }),
    indexKv: createRedisKeyValueStore({
      client,
      codec: createJsonCodec<JobIndex>(),
      opts: { keyspacePrefix: jobsIndexKeyspace(prefix) },
    }),
    lock: new RedisLock(
      { client, generateToken: () => randomUUID() },
      { keyspacePrefix: jobLocksKeyspace(prefix) },
    ),
  }
}

/** Single-process storage for local runs and tests. */
function createMemoryStorage(core: CoreServices): Storage {
  const { clock } = core

  return {
    jobKv: createMemoryKeyValueStore({ clock, codec: createJsonCodec<AnalysisJob>() }),
    claimKv: createMemoryKeyValueStore({ clock, codec: createJsonCodec<JobClaim>() }),
    externalIdKv: createMemoryKeyValueStore({ clock, codec: createJsonCodec<JobClaim>() }),
    indexKv: createMemoryKeyValueStore({ clock, codec: createJsonCodec<JobIndex>() }),
    lock: new MemoryLock({ clock }),
  }
}

export function createAnalysisJobServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
): AnalysisJobServices {
  const { clock, logger } = core
  const jobsConfig = config.jobs

  const storage =
    jobsConfig.storeDriver === "memory"
      ? createMemoryStorage(core)
      : createRedisStorage(config, infra)

  const jobStore = new JobStore(
    {
      jobKv: storage.jobKv,
      claimKv: storage.claimKv,
      externalIdKv: storage.externalIdKv,
      indexKv: storage.indexKv,
    },
    { maxRetries: jobsConfig.maxRetries },
  )

  const metrics = new JobMetrics()
  const notifier = new CompletionNotifier({ logger })
  notifier.subscribe(new JobEventLogger({ logger: logger.child({ module: "analysis-job-events" }) }))

  const coordinator = new CompletionCoordinator(
    { clock, logger, lock: storage.lock, jobStore, listener: notifier, metrics },
    { lockTtlMs: jobsConfig.lockTtlMs },
  )

  const submitter = new JobSubmitter({
    clock,
    logger,
    jobStore,
    analysisClient: infra.analysisClient,
    coordinator,
    metrics,
  })

  const verifier = new SignatureVerifier(
    { clock },
    {
      secret: config.webhooks.secret,
      toleranceMs: config.webhooks.signatureToleranceMs,
      scheme: config.webhooks.signatureScheme,
    },
  )

  const poller = new JobPoller(
    {
      clock,
      logger,
      jobStore,
      analysisClient: infra.analysisClient,
      coordinator,
      metrics,
    },
    {
      pollIntervalMs: jobsConfig.poller.intervalMs,
      batchSize: jobsConfig.poller.batchSize,
    },
  )

  const retryBackoff = createBackoff({
    delay: exponential({
      base: { milliseconds: jobsConfig.retryBackoff.baseMs },
      factor: 2,
    }),
    jitter: proportionalJitter({ low: 0.5, high: 1.5 }),
    min: { milliseconds: 0 },
    max: { milliseconds: jobsConfig.retryBackoff.maxMs },
  })

  const supervisor = new RetrySupervisor(
    { clock, logger, jobStore, coordinator, submitter, metrics },
    {
      maxRetries: jobsConfig.maxRetries,
      maxJobLifetimeMs: jobsConfig.maxJobLifetimeMs,
      retryBackoff,
    },
  )

  const pollerLoop = new SweepLoop(
    { clock, logger },
    {
      name: "analysis-jobs:poller",
      intervalMs: jobsConfig.poller.intervalMs,
      sweep: () => poller.sweep(),
    },
  )

  const supervisorLoop = new SweepLoop(
    { clock, logger },
    {
      name: "analysis-jobs:supervisor",
      intervalMs: jobsConfig.supervisor.intervalMs,
      sweep: () => supervisor.sweep(),
    },
  )

  return {
    clock,
    jobStore,
    submitter,
    verifier,
    coordinator,
    notifier,
    poller,
    supervisor,
    metrics,
    pollerLoop,
    supervisorLoop,
  }
}
