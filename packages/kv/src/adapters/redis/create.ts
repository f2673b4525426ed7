import { createClient, RESP_TYPES, type RedisClientOptions } from "redis"
import { CodecKeyValueStore } from "../../core/codec/codec-kv-store"
import type { Codec } from "../../ports/codec"
import type { KeyValueStore } from "../../ports/kv-store"
import { RedisBytesKeyValueStore, type RedisKvStoreOptions } from "./redis-bytes-kv-store"
import type { RedisBytesClient } from "./redis-client"

export type RedisBytesClientOptions = { url: string } & Omit<RedisClientOptions, "url">

/**
 * Blob strings come back as Buffer so stored bytes survive untouched.
 * Caller owns `connect()` and `quit()`.
 */
export function createRedisClient(options: RedisBytesClientOptions): RedisBytesClient {
  return createClient({ ...options, url: options.url }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}

export type RedisKvBundleOptions = {
  client: RedisBytesClient
  opts: RedisKvStoreOptions
}

export function createRedisKeyValueStore<T>(
  options: RedisKvBundleOptions & { codec: Codec<T> },
): KeyValueStore<T> {
  return new CodecKeyValueStore({
    bytesStore: new RedisBytesKeyValueStore({ client: options.client }, options.opts),
    codec: options.codec,
  })
}
