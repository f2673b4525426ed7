import { FakeClock, type Milliseconds } from "@conduit/clock"
import { NullLogger } from "@conduit/logger"
import type { Application, LifecycleHookContext, ServerHandle } from "@conduit/server"
import {
  type AppContext,
  type AppContextOptions,
  createAppContext,
} from "../app/create-context"
import {
  type SignatureScheme,
  signPayload,
} from "../domains/analysis-jobs/services/signature-verifier"
import { buildServer } from "../server"
import { TEST_START_MS, TEST_WEBHOOK_SECRET } from "./constants"
import { FakeAnalysisClient } from "./fake-analysis-client"

export { TEST_START_MS, TEST_WEBHOOK_SECRET } from "./constants"

export type TestHarnessLifecycle = {
  /** Run start hooks without binding a port */
  start: () => Promise<void>
  stop: () => Promise<void>
}

export type TestHarness = {
  /** Fully built Hono app, ready for app.request() */
  app: Application
  ctx: AppContext
  clock: FakeClock
  analysisClient: FakeAnalysisClient
  lifecycle: TestHarnessLifecycle
  listen: () => Promise<ServerHandle>
}

export type TestHarnessOptions = Pick<AppContextOptions, "configOverrides" | "domainOverrides"> & {
  env?: NodeJS.ProcessEnv
}

/**
 * App wired to in-memory storage, a fake clock and a fake analysis service.
 * Sweepers stay off; tests call `sweep()` themselves.
 */
export async function createTestHarness(options: TestHarnessOptions = {}): Promise<TestHarness> {
  const clock = new FakeClock(TEST_START_MS)
  const analysisClient = new FakeAnalysisClient()

  const ctx = await createAppContext({
    env: {
      NODE_ENV: "test",
      WEBHOOK_SECRET: TEST_WEBHOOK_SECRET,
      JOB_STORE_DRIVER: "memory",
      JOB_SWEEPERS_ENABLED: "false",
      ...options.env,
    },
    coreOverrides: { logger: new NullLogger(), clock },
    infraOverrides: { analysisClient },
    ...(options.configOverrides !== undefined && { configOverrides: options.configOverrides }),
    ...(options.domainOverrides !== undefined && { domainOverrides: options.domainOverrides }),
  })

  const { server } = buildServer(ctx)

  return {
    ctx,
    clock,
    analysisClient,
    lifecycle: createTestHarnessLifecycle(ctx),
    app: server.build(),
    listen: () => server.start(),
  }
}

function createTestHarnessLifecycle(ctx: AppContext): TestHarnessLifecycle {
  const DEFAULT_HOOK_BUDGET_MS: Milliseconds = 30_000

  const hookContext = (): LifecycleHookContext => ({
    signal: new AbortController().signal,
    timeRemainingMs: DEFAULT_HOOK_BUDGET_MS,
  })

  return {
    start: async () => {
      for (const hook of ctx.createStartHooks(ctx)) {
        await hook.fn(hookContext())
      }
    },

    stop: async () => {
      for (const hook of ctx.createStopHooks(ctx)) {
        await hook.fn(hookContext())
      }
    },
  }
}

/** Headers the analysis service would send with `body`. */
export function signedWebhookHeaders(
  body: string,
  timestampMs: number,
  secret: string = TEST_WEBHOOK_SECRET,
  scheme: SignatureScheme = "ms-raw-body",
): Record<string, string> {
  const timestamp =
    scheme === "seconds-body-digest" ? String(Math.floor(timestampMs / 1_000)) : String(timestampMs)

  return {
    "content-type": "application/json",
    "x-analysis-timestamp": timestamp,
    "x-analysis-signature": signPayload(secret, timestamp, body, scheme),
  }
}
