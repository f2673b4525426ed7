import type { Clock, UnixMs } from "@conduit/clock"
import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import type { KvCasResult, KvResultVersioned, KvVersion } from "../../ports/kv-cas"
import type { KvWriteResult } from "../../ports/kv-conditional"
import type { KvKey } from "../../ports/kv-key"
import type { KvSetOptions } from "../../ports/kv-options"
import type { KvResult } from "../../ports/kv-result"

export type MemoryKvStoreOptions = {
  /**
   * Maximum number of live entries. Writes that would exceed it throw.
   */
  maxEntries?: number
}

export type MemoryKvStoreDeps = {
  clock: Clock
}

type MemoryEntry = {
  value: Uint8Array
  version: KvVersion
  expiresAtMs?: UnixMs
}

/**
 * Single-process store. Every operation runs synchronously between awaits,
 * which makes the conditional writes atomic.
 */
export class MemoryBytesKeyValueStore implements BytesKeyValueStore {
  private readonly store = new Map<KvKey, MemoryEntry>()
  private versionCounter = 0

  public constructor(
    private readonly deps: MemoryKvStoreDeps,
    private readonly opts: MemoryKvStoreOptions = {},
  ) {}

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    const entry = this.live(key)
    if (!entry) return { kind: "not_found" }

    return { kind: "found", value: new Uint8Array(entry.value) }
  }

  async set(key: KvKey, value: Uint8Array, opts?: Partial<KvSetOptions>): Promise<void> {
    this.write(key, value, this.live(key), opts)
  }

  async delete(key: KvKey): Promise<void> {
    this.store.delete(key)
  }

  async has(key: KvKey): Promise<boolean> {
    return this.live(key) !== undefined
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<Uint8Array>>> {
    const out = new Map<KvKey, KvResult<Uint8Array>>()

    for (const key of keys) {
      out.set(key, await this.get(key))
    }

    return out
  }

  async getVersioned(key: KvKey): Promise<KvResultVersioned<Uint8Array>> {
    const entry = this.live(key)
    if (!entry) return { kind: "not_found" }

    return { kind: "found", value: new Uint8Array(entry.value), version: entry.version }
  }

  async setIfVersion(
    key: KvKey,
    value: Uint8Array,
    expectedVersion: KvVersion,
    opts?: Partial<KvSetOptions>,
  ): Promise<KvCasResult> {
    const existing = this.live(key)

    if (!existing) return { kind: "not_found" }
    if (existing.version !== expectedVersion) return { kind: "conflict" }

    return { kind: "written", version: this.write(key, value, existing, opts) }
  }

  async setIfNotExists(
    key: KvKey,
    value: Uint8Array,
    opts?: Partial<KvSetOptions>,
  ): Promise<KvWriteResult> {
    if (this.live(key)) return { kind: "skipped" }

    this.write(key, value, undefined, opts)

    return { kind: "written" }
  }

  private write(
    key: KvKey,
    value: Uint8Array,
    existing: MemoryEntry | undefined,
    opts?: Partial<KvSetOptions>,
  ): KvVersion {
    if (!existing) this.enforceMaxEntries()

    const expiresAtMs = opts?.ttl
      ? this.deps.clock.nowMs() + opts.ttl.milliseconds
      : existing?.expiresAtMs

    const version = String(++this.versionCounter)

    this.store.set(key, {
      value: new Uint8Array(value),
      version,
      ...(expiresAtMs !== undefined && { expiresAtMs }),
    })

    return version
  }

  /** Returns the entry if present and unexpired, evicting it otherwise. */
  private live(key: KvKey): MemoryEntry | undefined {
    const entry = this.store.get(key)
    if (!entry) return undefined

    if (this.isExpired(entry)) {
      this.store.delete(key)
      return undefined
    }

    return entry
  }

  private enforceMaxEntries(): void {
    if (this.opts.maxEntries === undefined) return

    for (const [key, entry] of this.store) {
      if (this.isExpired(entry)) this.store.delete(key)
    }

    if (this.store.size >= this.opts.maxEntries) {
      throw new Error(
        `MemoryBytesKeyValueStore: max entries (${this.opts.maxEntries}) exceeded`,
      )
    }
  }

  private isExpired(entry: MemoryEntry): boolean {
    if (entry.expiresAtMs === undefined) return false

    return this.deps.clock.nowMs() >= entry.expiresAtMs
  }
}
