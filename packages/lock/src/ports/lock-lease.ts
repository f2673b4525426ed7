import type { LockKey } from "./lock"
import type { LockTtl } from "./options"

export interface LockLease {
  readonly key: LockKey

  /** Releases the lock if still owned. Idempotent. */
  release(): Promise<void>

  /** Returns `false` if the lease expired or was released. */
  extend(ttl: LockTtl): Promise<boolean>
}
