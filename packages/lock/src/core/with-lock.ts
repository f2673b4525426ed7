import type { Lock, LockKey } from "../ports/lock"
import type { TryAcquireOptions } from "../ports/options"

/**
 * Runs `fn` while holding `key`, or returns `null` without running it when
 * the lock is busy. The lease is released even if `fn` throws.
 */
export async function tryWithLock<T>(
  lock: Lock,
  key: LockKey,
  fn: () => Promise<T>,
  opts: TryAcquireOptions,
): Promise<T | null> {
  const lease = await lock.tryAcquire(key, opts)

  if (!lease) {
    return null
  }

  try {
    return await fn()
  } finally {
    await lease.release()
  }
}
