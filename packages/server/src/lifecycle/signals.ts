import type { Logger } from "@conduit/logger"
import type { StopResult } from "./shutdown"

export interface SignalHandlerContext {
  logger: Logger
  stop: () => Promise<StopResult>

  /** Hard exit if a fatal shutdown hangs. @default 10_000 */
  fatalTimeoutMs?: number
}

export interface SignalHandler {
  unregister: () => void
}

async function runStop(ctx: SignalHandlerContext, reason: string): Promise<void> {
  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failureCount: result.failures.length,
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}

/**
 * SIGINT/SIGTERM stop gracefully. An uncaught exception or unhandled rejection
 * stops with a hard deadline and exits non-zero.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? 10_000
  let stopping = false

  const onSignal = (signal: NodeJS.Signals) => {
    ctx.logger.info("Received signal", { signal })

    if (stopping) return
    stopping = true

    ctx.logger.warn("Shutdown triggered", { reason: signal })
    void runStop(ctx, signal)
  }

  const onFatal = (reason: string, err: unknown) => {
    ctx.logger.fatal("Fatal error", { reason, err })

    if (stopping) process.exit(1)
    stopping = true

    const timer = setTimeout(() => {
      ctx.logger.fatal("Forced exit after timeout", { timeoutMs: fatalTimeoutMs })
      process.exit(1)
    }, fatalTimeoutMs)
    timer.unref()

    void runStop(ctx, reason).finally(() => process.exit(1))
  }

  const sigint = () => onSignal("SIGINT")
  const sigterm = () => onSignal("SIGTERM")
  const uncaught = (err: Error) => onFatal("uncaughtException", err)
  const rejection = (reason: unknown) => onFatal("unhandledRejection", reason)

  process.on("SIGINT", sigint)
  process.on("SIGTERM", sigterm)
  process.on("uncaughtException", uncaught)
  process.on("unhandledRejection", rejection)

  return {
    unregister: () => {
      process.off("SIGINT", sigint)
      process.off("SIGTERM", sigterm)
      process.off("uncaughtException", uncaught)
      process.off("unhandledRejection", rejection)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers
