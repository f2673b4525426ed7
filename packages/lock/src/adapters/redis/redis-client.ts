/**
 * Commands the Redis lock needs. A node-redis v5 client, including the
 * Buffer-mapped one from `@conduit/kv`, satisfies it.
 */
export type RedisLockClient = {
  set(key: string, value: string, opts: { NX: true; PX: number }): Promise<string | null>
  eval(script: string, opts: { keys: string[]; arguments: string[] }): Promise<unknown>
}
