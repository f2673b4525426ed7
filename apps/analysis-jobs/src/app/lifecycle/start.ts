import type { LifecycleHook } from "@conduit/server"
import type { AppContext } from "../create-context"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const { config, infra } = context
  const { analysisJobs } = context.services.domains
  const hooks: LifecycleHook[] = []

  if (config.jobs.storeDriver === "redis") {
    hooks.push({
      name: "start:redis",
      fn: async () => {
        if (!infra.redisClient.isOpen) await infra.redisClient.connect()
      },
    })
  }

  if (config.jobs.sweepersEnabled) {
    hooks.push(
      {
        name: "start:analysis-jobs:poller",
        fn: async () => {
          await analysisJobs.pollerLoop.start()
        },
      },
      {
        name: "start:analysis-jobs:supervisor",
        fn: async () => {
          await analysisJobs.supervisorLoop.start()
        },
      },
    )
  }

  return hooks
}

export type CreateStartHooksFn = typeof createStartHooks
