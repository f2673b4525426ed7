import type { Delay } from "./delay-policy"

/**
 * Spreads retries apart. Output is sanitized by `createBackoff`, so
 * implementations are not trusted to stay in range.
 */
export interface JitterStrategy {
  apply(delay: Delay): Delay
}
