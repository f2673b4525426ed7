import type { LockLease } from "./lock-lease"
import type { TryAcquireOptions } from "./options"

export type LockKey = string

/**
 * Mutual exclusion across processes sharing the same backend.
 *
 * @remarks
 * Acquisition never waits. A caller that loses the race gets `null` and is
 * expected to back off; the holder's work is authoritative.
 */
export interface Lock {
  /**
   * @returns The lease if acquired immediately, or `null` if the lock is held.
   */
  tryAcquire(key: LockKey, opts: TryAcquireOptions): Promise<LockLease | null>
}
