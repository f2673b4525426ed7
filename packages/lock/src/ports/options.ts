import type { Milliseconds } from "@conduit/clock"

export type LockTtl = { milliseconds: Milliseconds }

export type TryAcquireOptions = {
  /** How long the lease is valid before auto-expiring. */
  ttl: LockTtl
}
