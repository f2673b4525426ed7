import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import type { KvCasResult, KvResultVersioned, KvVersion } from "../../ports/kv-cas"
import type { KvWriteResult } from "../../ports/kv-conditional"
import type { Codec } from "../../ports/codec"
import type { KvKey } from "../../ports/kv-key"
import type { KvSetOptions } from "../../ports/kv-options"
import type { KvResult } from "../../ports/kv-result"
import type { KeyValueStore } from "../../ports/kv-store"

export type CodecKeyValueStoreDeps<T> = {
  codec: Codec<T>
  bytesStore: BytesKeyValueStore
}

export class CodecKeyValueStore<T> implements KeyValueStore<T> {
  public constructor(private readonly deps: CodecKeyValueStoreDeps<T>) {}

  async get(key: KvKey): Promise<KvResult<T>> {
    return this.decodeResult(await this.deps.bytesStore.get(key))
  }

  async set(key: KvKey, value: T, opts?: Partial<KvSetOptions>): Promise<void> {
    await this.deps.bytesStore.set(key, this.deps.codec.encode(value), opts)
  }

  async delete(key: KvKey): Promise<void> {
    await this.deps.bytesStore.delete(key)
  }

  async has(key: KvKey): Promise<boolean> {
    return await this.deps.bytesStore.has(key)
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<T>>> {
    const res = await this.deps.bytesStore.getMany(keys)

    const out = new Map<KvKey, KvResult<T>>()
    for (const [k, v] of res.entries()) {
      out.set(k, this.decodeResult(v))
    }

    return out
  }

  async getVersioned(key: KvKey): Promise<KvResultVersioned<T>> {
    const res = await this.deps.bytesStore.getVersioned(key)
    if (res.kind === "not_found") return res

    return { kind: "found", value: this.deps.codec.decode(res.value), version: res.version }
  }

  async setIfVersion(
    key: KvKey,
    value: T,
    expectedVersion: KvVersion,
    opts?: Partial<KvSetOptions>,
  ): Promise<KvCasResult> {
    return await this.deps.bytesStore.setIfVersion(
      key,
      this.deps.codec.encode(value),
      expectedVersion,
      opts,
    )
  }

  async setIfNotExists(
    key: KvKey,
    value: T,
    opts?: Partial<KvSetOptions>,
  ): Promise<KvWriteResult> {
    return await this.deps.bytesStore.setIfNotExists(key, this.deps.codec.encode(value), opts)
  }

  private decodeResult(res: KvResult<Uint8Array>): KvResult<T> {
    if (res.kind === "not_found") return res

    return { kind: "found", value: this.deps.codec.decode(res.value) }
  }
}
