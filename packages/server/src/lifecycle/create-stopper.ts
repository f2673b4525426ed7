import type { Clock } from "@conduit/clock"
import type { Logger } from "@conduit/logger"
import type { LifecycleHook } from "./lifecycle-hook"
import type { Closeable, ShutdownFn, StopResult } from "./shutdown"

export interface ServerHandle {
  /** Idempotent; concurrent callers share one shutdown. */
  stop(): Promise<StopResult>
  address: { host: string; port: number }
}

export interface StopperContext {
  server: Closeable
  clock: Clock
  logger: Logger
  host: string
  port: number
  shutdownTimeoutMs: number
  stopHooks: LifecycleHook[]
  shutdown: ShutdownFn
  setReady: (value: boolean) => void
  onStop: () => void
}

export function createStopper(ctx: StopperContext): ServerHandle {
  let stopping: Promise<StopResult> | undefined

  const run = async (): Promise<StopResult> => {
    ctx.setReady(false)

    try {
      return await ctx.shutdown({
        server: ctx.server,
        clock: ctx.clock,
        logger: ctx.logger,
        deadlineMs: ctx.clock.nowMs() + ctx.shutdownTimeoutMs,
        stopHooks: ctx.stopHooks,
      })
    } finally {
      ctx.onStop()
    }
  }

  return {
    stop: () => {
      stopping ??= run()
      return stopping
    },
    address: { host: ctx.host, port: ctx.port },
  }
}

export type CreateStopperFn = typeof createStopper
