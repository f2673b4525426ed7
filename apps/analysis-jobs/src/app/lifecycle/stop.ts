import type { LifecycleHook } from "@conduit/server"
import type { AppContext } from "../create-context"

/** Sweepers stop before Redis goes away. */
export function createStopHooks(context: AppContext): LifecycleHook[] {
  const { config, infra } = context
  const { analysisJobs } = context.services.domains

  const hooks: LifecycleHook[] = [
    {
      name: "stop:analysis-jobs:poller",
      fn: async () => {
        await analysisJobs.pollerLoop.stop()
      },
    },
    {
      name: "stop:analysis-jobs:supervisor",
      fn: async () => {
        await analysisJobs.supervisorLoop.stop()
      },
    },
  ]

  if (config.jobs.storeDriver === "redis") {
    hooks.push({
      name: "stop:redis",
      fn: async () => {
        if (infra.redisClient.isOpen) await infra.redisClient.quit()
      },
    })
  }

  return hooks
}

export type CreateStopHooksFn = typeof createStopHooks
