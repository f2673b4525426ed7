import { assertValidTtl } from "../../core/validation"
import type { Lock, LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type { TryAcquireOptions } from "../../ports/options"
import type { RedisLockClient } from "./redis-client"

export type RedisLockDeps = {
  client: RedisLockClient
  generateToken: () => string
}

export type RedisLockConfig = {
  /** Partition of the shared keyspace owned by this lock, e.g. "analysis-job:". */
  keyspacePrefix: string
}

const RELEASE = `
  if redis.call("GET", KEYS[1]) == ARGV[1] then
    return redis.call("DEL", KEYS[1])
  end
  return 0
`

const EXTEND = `
  if redis.call("GET", KEYS[1]) == ARGV[1] then
    return redis.call("PEXPIRE", KEYS[1], ARGV[2])
  end
  return 0
`

/**
 * `SET NX PX` with a random token. Release and extend only touch the key while
 * it still carries the token, so an expired holder cannot free a successor.
 */
export class RedisLock implements Lock {
  private readonly prefix: string

  public constructor(
    private readonly deps: RedisLockDeps,
    config: RedisLockConfig,
  ) {
    this.prefix = config.keyspacePrefix.endsWith(":")
      ? config.keyspacePrefix
      : `${config.keyspacePrefix}:`
  }

  async tryAcquire(key: LockKey, opts: TryAcquireOptions): Promise<LockLease | null> {
    assertValidTtl(opts.ttl, key)

    const redisKey = `${this.prefix}${key}`
    const token = this.deps.generateToken()
    const { client } = this.deps

    const res = await client.set(redisKey, token, { NX: true, PX: opts.ttl.milliseconds })
    if (res !== "OK") return null

    let released = false

    return {
      key,
      async release() {
        if (released) return
        released = true

        await client.eval(RELEASE, { keys: [redisKey], arguments: [token] })
      },
      async extend(ttl) {
        if (released) return false
        assertValidTtl(ttl, key)

        const reply = await client.eval(EXTEND, {
          keys: [redisKey],
          arguments: [token, String(ttl.milliseconds)],
        })

        return Number(reply) === 1
      },
    }
  }
}
