import type { LockTtl } from "../ports/options"

export function assertValidTtl(ttl: LockTtl, key: string): void {
  if (!Number.isFinite(ttl.milliseconds) || ttl.milliseconds <= 0) {
    throw new RangeError(`Invalid ttl ${ttl.milliseconds}ms for lock ${key}`)
  }
}
