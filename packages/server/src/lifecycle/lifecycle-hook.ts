import type { Milliseconds } from "@conduit/clock"

export interface LifecycleHookContext {
  /** Aborts when the phase deadline passes. */
  signal: AbortSignal
  timeRemainingMs: Milliseconds
}

export interface LifecycleHook {
  name: string
  fn: (ctx: LifecycleHookContext) => Promise<void>
}

export interface HookFailure {
  hook: string
  error: unknown
}
