import type { Delay, DelayPolicy } from "../ports/delay-policy"
import type { JitterStrategy } from "../ports/jitter-strategy"

export type CreateBackoffOptions = {
  delay: DelayPolicy
  jitter?: JitterStrategy

  /** Floor for delay. Must be finite, non-negative. */
  min: Delay

  /** Ceiling for delay. Must be finite, non-negative, >= min. */
  max: Delay
}

function assertBound(label: string, ms: number): void {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`${label}.milliseconds must be finite and >= 0 (got ${ms})`)
  }
}

/**
 * Wraps a policy with jitter, then clamps into [min, max] and floors to whole
 * milliseconds. Non-finite or negative intermediate values fall back to `min`.
 */
export function createBackoff({ delay, jitter, min, max }: CreateBackoffOptions): DelayPolicy {
  assertBound("min", min.milliseconds)
  assertBound("max", max.milliseconds)

  if (max.milliseconds < min.milliseconds) {
    throw new RangeError(
      `max.milliseconds must be >= min.milliseconds (got ${max.milliseconds} < ${min.milliseconds})`,
    )
  }

  return {
    getDelay(attempt: number): Delay {
      const raw = delay.getDelay(attempt)
      const ms = (jitter ? jitter.apply(raw) : raw).milliseconds
      const safe = Number.isFinite(ms) && ms >= 0 ? ms : min.milliseconds
      const clamped = Math.max(min.milliseconds, Math.min(max.milliseconds, safe))

      return { milliseconds: Math.floor(clamped) }
    },
  }
}
