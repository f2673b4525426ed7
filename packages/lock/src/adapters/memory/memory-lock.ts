import type { Clock, UnixMs } from "@conduit/clock"
import { assertValidTtl } from "../../core/validation"
import type { Lock, LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type { LockTtl, TryAcquireOptions } from "../../ports/options"

export type MemoryLockDeps = {
  clock: Clock
}

type Holder = {
  token: number
  expiresAtMs: UnixMs
}

/**
 * Single-process lock. Expiry is read from the clock on each access, so a
 * lease whose holder stalls past its ttl is taken over by the next caller.
 */
export class MemoryLock implements Lock {
  private readonly holders = new Map<LockKey, Holder>()
  private tokens = 0

  public constructor(private readonly deps: MemoryLockDeps) {}

  public async tryAcquire(key: LockKey, opts: TryAcquireOptions): Promise<LockLease | null> {
    assertValidTtl(opts.ttl, key)

    if (this.current(key)) return null

    const token = ++this.tokens
    this.holders.set(key, { token, expiresAtMs: this.expiry(opts.ttl) })

    return {
      key,
      release: async () => {
        if (this.holders.get(key)?.token === token) this.holders.delete(key)
      },
      extend: async (ttl) => {
        assertValidTtl(ttl, key)

        const holder = this.current(key)
        if (holder?.token !== token) return false

        holder.expiresAtMs = this.expiry(ttl)
        return true
      },
    }
  }

  private current(key: LockKey): Holder | undefined {
    const holder = this.holders.get(key)
    if (!holder) return undefined

    if (this.deps.clock.nowMs() >= holder.expiresAtMs) {
      this.holders.delete(key)
      return undefined
    }

    return holder
  }

  private expiry(ttl: LockTtl): UnixMs {
    return this.deps.clock.nowMs() + ttl.milliseconds
  }
}
