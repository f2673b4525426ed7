import type { Milliseconds, UnixMs } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date.
   *
   * @remarks
   * Prefer `nowMs()` for arithmetic.
   */
  now(): Date

  nowMs(): UnixMs
}

export interface Sleeper {
  /** Resolves after `ms`, or as soon as `signal` aborts. */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
