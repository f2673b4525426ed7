import type { Clock, UnixMs } from "@conduit/clock"
import type { Logger } from "@conduit/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error) => void) => unknown
}

export type ShutdownContext = {
  server: Closeable
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  stopHooks: LifecycleHook[]
}

export type StopResult = {
  /** No failures and no timeout. */
  ok: boolean

  failures: HookFailure[]

  /**
   * The deadline passed before every hook ran. Open sockets are not
   * force-closed.
   */
  timedOut: boolean
}

/**
 * Stops accepting connections first, then runs stop hooks (workers, clients)
 * so in-flight requests can still reach their dependencies.
 */
export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  ctx.logger.warn("Shutting down gracefully...")

  const { failures, timedOut } = await runHooks(
    { phase: "shutdown", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    [closeServerHook(ctx.server), ...ctx.stopHooks],
    { failFast: false },
  )

  ctx.logger.info("Shutdown complete")

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type ShutdownFn = typeof shutdown

function closeServerHook(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: ({ signal }) =>
      new Promise<void>((resolve, reject) => {
        if (signal.aborted) return resolve()

        signal.addEventListener("abort", () => resolve(), { once: true })
        server.close((err) => (err ? reject(err) : resolve()))
      }),
  }
}
