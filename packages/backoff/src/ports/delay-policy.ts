export type Milliseconds = number

export type Delay = { milliseconds: Milliseconds }

/**
 * Delay before the next attempt; attempt is 0-indexed.
 */
export interface DelayPolicy {
  getDelay(attempt: number): Delay
}
