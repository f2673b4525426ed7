import type { Clock, UnixMs } from "@conduit/clock"
import type { Logger } from "@conduit/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
}

export type RunHooksPolicy = {
  /** Stop after the first failure. Startup sets this, shutdown doesn't. */
  failFast?: boolean
}

export type RunHooksResult = { failures: HookFailure[]; timedOut: boolean }

type HookAttempt = { failure?: HookFailure; timedOut: boolean }

/**
 * Runs hooks in order against one shared deadline.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<RunHooksResult> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const attempt = await runOneHook(ctx, hook)

    if (attempt.failure) {
      failures.push(attempt.failure)
      if (policy.failFast) return { failures, timedOut: attempt.timedOut }
    }

    if (attempt.timedOut) return { failures, timedOut: true }
  }

  return { failures, timedOut: false }
}

async function runOneHook(ctx: RunHooksContext, hook: LifecycleHook): Promise<HookAttempt> {
  const msLeft = Math.max(0, ctx.deadlineMs - ctx.clock.nowMs())

  if (msLeft <= 0) {
    ctx.logger.warn(`Skipping remaining ${ctx.phase} hooks due to timeout`)
    return { timedOut: true }
  }

  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), msLeft)
  const hitDeadline = () => controller.signal.aborted || ctx.clock.nowMs() >= ctx.deadlineMs

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: msLeft })

    if (hitDeadline()) {
      ctx.logger.warn(`${ctx.phase} deadline exceeded during hook: ${hook.name}`)
      return { timedOut: true }
    }

    ctx.logger.info(`Executed ${ctx.phase} hook: ${hook.name}`)

    return { timedOut: false }
  } catch (err) {
    ctx.logger.error(`${ctx.phase} hook failed: ${hook.name}`, { err })

    return { failure: { hook: hook.name, error: err }, timedOut: hitDeadline() }
  } finally {
    clearTimeout(timer)
  }
}
