import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/**
 * Manually driven clock for tests.
 *
 * `sleep` records the requested delay and resolves on the next microtask
 * without moving time; tests move time with `advance` or `set`.
 */
export class FakeClock implements Clock {
  private time: UnixMs
  private readonly sleeps: Milliseconds[] = []

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }

  /** Delays passed to `sleep`, oldest first. */
  sleepsRequested(): readonly Milliseconds[] {
    return this.sleeps
  }

  async sleep(ms: Milliseconds, _signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms)
  }
}
