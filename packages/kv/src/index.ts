export {
  createMemoryBytesKeyValueStore,
  createMemoryKeyValueStore,
  type MemoryKvBundleOptions,
} from "./adapters/memory/create"
export {
  MemoryBytesKeyValueStore,
  type MemoryKvStoreDeps,
  type MemoryKvStoreOptions,
} from "./adapters/memory/memory-bytes-kv-store"
export {
  createRedisClient,
  createRedisKeyValueStore,
  type RedisBytesClientOptions,
  type RedisKvBundleOptions,
} from "./adapters/redis/create"
export {
  RedisBytesKeyValueStore,
  type RedisKvStoreOptions,
} from "./adapters/redis/redis-bytes-kv-store"
export type { RedisBytesClient } from "./adapters/redis/redis-client"
export { CodecKeyValueStore } from "./core/codec/codec-kv-store"
export type { BytesKeyValueStore } from "./ports/bytes-kv-store"
export type { Codec } from "./ports/codec"
export type { KeyValueStore } from "./ports/kv-store"
export type { KvCasResult, KvResultVersioned, KvVersion } from "./ports/kv-cas"
export type { KvWriteResult } from "./ports/kv-conditional"
export type { KvKey } from "./ports/kv-key"
export type { KvSetOptions, KvTtl } from "./ports/kv-options"
export type { KvFound, KvNotFound, KvResult } from "./ports/kv-result"
