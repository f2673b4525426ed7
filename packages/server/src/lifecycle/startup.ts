import type { Clock, UnixMs } from "@conduit/clock"
import type { Logger } from "@conduit/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export type StartupContext = {
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  startHooks: LifecycleHook[]
}

export type StartResult = { ok: boolean; failures: HookFailure[]; timedOut: boolean }

export async function startup(ctx: StartupContext): Promise<StartResult> {
  ctx.logger.debug("Running startup hooks...")

  const { failures, timedOut } = await runHooks(
    { phase: "startup", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    ctx.startHooks,
    { failFast: true },
  )

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type StartupFn = typeof startup
