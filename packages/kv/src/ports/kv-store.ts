import type { KvCasResult, KvResultVersioned, KvVersion } from "./kv-cas"
import type { KvWriteResult } from "./kv-conditional"
import type { KvKey } from "./kv-key"
import type { KvSetOptions } from "./kv-options"
import type { KvResult } from "./kv-result"

/**
 * Authoritative key-value storage with optimistic concurrency and
 * conditional writes.
 *
 * @remarks
 * Adapters implement the conditional operations atomically using the backing
 * store's native mechanism. Emulating them with a read followed by a write is
 * not safe.
 */
export interface KeyValueStore<T> {
  get(key: KvKey): Promise<KvResult<T>>

  /** Overwrites. Without a ttl, an existing expiry is preserved. */
  set(key: KvKey, value: T, opts?: Partial<KvSetOptions>): Promise<void>

  /** Deleting a missing key is a no-op. */
  delete(key: KvKey): Promise<void>

  has(key: KvKey): Promise<boolean>

  /** One result per requested key, in request order. */
  getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<T>>>

  getVersioned(key: KvKey): Promise<KvResultVersioned<T>>

  /**
   * Writes only if the stored version still equals `expectedVersion`.
   * "not_found" means the key disappeared since it was read.
   */
  setIfVersion(
    key: KvKey,
    value: T,
    expectedVersion: KvVersion,
    opts?: Partial<KvSetOptions>,
  ): Promise<KvCasResult>

  /** Claims a key. "skipped" means somebody else holds it. */
  setIfNotExists(key: KvKey, value: T, opts?: Partial<KvSetOptions>): Promise<KvWriteResult>
}
