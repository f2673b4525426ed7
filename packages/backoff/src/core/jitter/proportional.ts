import { systemRandom } from "../../adapters/random"
import type { Delay } from "../../ports/delay-policy"
import type { JitterStrategy } from "../../ports/jitter-strategy"
import type { RandomSource } from "../../ports/random-source"

export type ProportionalJitterOptions = {
  /** Lower bound of the multiplier. Default: 0.5 */
  low?: number

  /** Upper bound of the multiplier (exclusive). Default: 1.5 */
  high?: number

  random?: RandomSource
}

/**
 * Scales the delay by a random factor in [low, high). The defaults keep the
 * mean equal to the undecorated delay.
 */
export function proportionalJitter(opts: ProportionalJitterOptions = {}): JitterStrategy {
  const { low = 0.5, high = 1.5, random = systemRandom } = opts

  if (!(Number.isFinite(low) && Number.isFinite(high)) || low < 0 || high < low) {
    throw new RangeError(`jitter bounds must satisfy 0 <= low <= high (got ${low}, ${high})`)
  }

  return {
    apply(delay: Delay): Delay {
      const factor = low + random.next() * (high - low)

      return { milliseconds: delay.milliseconds * factor }
    },
  }
}
