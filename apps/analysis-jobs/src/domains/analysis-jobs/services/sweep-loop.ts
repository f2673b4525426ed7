import type { Clock, Milliseconds } from "@conduit/clock"
import type { Logger } from "@conduit/logger"

export type SweepLoopDeps = {
  clock: Clock
  logger: Logger
}

export type SweepLoopConfig = {
  name: string

  /** Pause between the end of one sweep and the start of the next. */
  intervalMs: Milliseconds

  sweep: () => Promise<unknown>
}

/**
 * Runs `sweep` on a fixed interval until stopped. A failing sweep is logged
 * and the loop carries on.
 */
export class SweepLoop {
  private running = false
  private loop: Promise<void> | null = null
  private abort = new AbortController()

  constructor(
    private readonly deps: SweepLoopDeps,
    private readonly config: SweepLoopConfig,
  ) {}

  get isRunning(): boolean {
    return this.running
  }

  async start(): Promise<void> {
    if (this.running) return

    this.running = true
    this.abort = new AbortController()
    this.loop = this.runLoop()

    this.deps.logger.info("Sweep loop started", {
      loop: this.config.name,
      intervalMs: this.config.intervalMs,
    })
  }

  /** Resolves once the sweep in progress, if any, has finished. */
  async stop(): Promise<void> {
    if (!this.running) return

    this.running = false
    this.abort.abort()

    await this.loop
    this.loop = null

    this.deps.logger.info("Sweep loop stopped", { loop: this.config.name })
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      try {
        await this.config.sweep()
      } catch (err) {
        this.deps.logger.error("Sweep failed", { err, loop: this.config.name })
      }

      if (!this.running) break

      await this.deps.clock.sleep(this.config.intervalMs, this.abort.signal)
    }
  }
}
