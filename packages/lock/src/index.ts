export { MemoryLock, type MemoryLockDeps } from "./adapters/memory/memory-lock"
export type { RedisLockClient } from "./adapters/redis/redis-client"
export { RedisLock, type RedisLockConfig, type RedisLockDeps } from "./adapters/redis/redis-lock"
export { tryWithLock } from "./core/with-lock"
export type { Lock, LockKey } from "./ports/lock"
export type { LockLease } from "./ports/lock-lease"
export type { LockTtl, TryAcquireOptions } from "./ports/options"
