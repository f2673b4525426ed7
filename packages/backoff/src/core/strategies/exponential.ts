import type { Delay, DelayPolicy } from "../../ports/delay-policy"

export interface ExponentialOptions {
  base: Delay

  /** Multiplier per attempt. Default: 2 */
  factor?: number
}

/** `base * factor^attempt`, unbounded. Pair with `createBackoff` for a ceiling. */
export function exponential({ base, factor = 2 }: ExponentialOptions): DelayPolicy {
  return {
    getDelay: (attempt) => ({ milliseconds: base.milliseconds * factor ** attempt }),
  }
}
