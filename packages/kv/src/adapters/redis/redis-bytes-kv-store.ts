import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import type { KvCasResult, KvResultVersioned, KvVersion } from "../../ports/kv-cas"
import type { KvWriteResult } from "../../ports/kv-conditional"
import type { KvKey } from "../../ports/kv-key"
import type { KvSetOptions } from "../../ports/kv-options"
import type { KvResult } from "../../ports/kv-result"
import type { RedisBytesClient } from "./redis-client"
import {
  GET_VERSIONED,
  SET_IF_NOT_EXISTS,
  SET_IF_VERSION,
  SET_WITH_VERSION,
} from "./scripts"

export type RedisKvStoreOptions = {
  /** Prepended to every key, e.g. "analysis-jobs:". */
  keyspacePrefix: string
}

export type RedisBytesKvStoreDeps = {
  client: RedisBytesClient
}

/**
 * Redis implementation of BytesKeyValueStore.
 *
 * @remarks
 * - Requires Redis 6+ (uses KEEPTTL)
 * - Keeps a version counter at `<key>:v` next to each value key
 * - Every write goes through a script so the counter moves with the value
 */
export class RedisBytesKeyValueStore implements BytesKeyValueStore {
  public constructor(
    private readonly deps: RedisBytesKvStoreDeps,
    private readonly opts: RedisKvStoreOptions,
  ) {}

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    return this.toResult(await this.deps.client.get(this.fullKey(key)))
  }

  async set(key: KvKey, value: Uint8Array, opts?: Partial<KvSetOptions>): Promise<void> {
    const fullKey = this.fullKey(key)

    await this.deps.client.eval(SET_WITH_VERSION, {
      keys: [fullKey, this.versionKey(fullKey)],
      arguments: [this.toBuffer(value), this.ttlArg(opts)],
    })
  }

  async delete(key: KvKey): Promise<void> {
    const fullKey = this.fullKey(key)

    await this.deps.client.del([fullKey, this.versionKey(fullKey)])
  }

  async has(key: KvKey): Promise<boolean> {
    return (await this.deps.client.exists(this.fullKey(key))) >= 1
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<Uint8Array>>> {
    const out = new Map<KvKey, KvResult<Uint8Array>>()
    if (keys.length === 0) return out

    const buffers = await this.deps.client.mGet(keys.map((k) => this.fullKey(k)))

    for (const [i, key] of keys.entries()) {
      out.set(key, this.toResult(buffers[i] ?? null))
    }

    return out
  }

  async getVersioned(key: KvKey): Promise<KvResultVersioned<Uint8Array>> {
    const fullKey = this.fullKey(key)

    const reply = await this.deps.client.eval(GET_VERSIONED, {
      keys: [fullKey, this.versionKey(fullKey)],
      arguments: [],
    })

    if (!Array.isArray(reply)) return { kind: "not_found" }

    const [value, version]: unknown[] = reply

    if (!Buffer.isBuffer(value)) {
      throw new TypeError(`Unexpected reply for ${fullKey}: value is not a blob string`)
    }

    return { kind: "found", value: new Uint8Array(value), version: this.asString(version) }
  }

  async setIfVersion(
    key: KvKey,
    value: Uint8Array,
    expectedVersion: KvVersion,
    opts?: Partial<KvSetOptions>,
  ): Promise<KvCasResult> {
    const fullKey = this.fullKey(key)

    const reply = await this.deps.client.eval(SET_IF_VERSION, {
      keys: [fullKey, this.versionKey(fullKey)],
      arguments: [expectedVersion, this.toBuffer(value), this.ttlArg(opts)],
    })

    const result = this.asString(reply)

    if (result === "not_found") return { kind: "not_found" }
    if (result === "conflict") return { kind: "conflict" }

    return { kind: "written", version: result }
  }

  async setIfNotExists(
    key: KvKey,
    value: Uint8Array,
    opts?: Partial<KvSetOptions>,
  ): Promise<KvWriteResult> {
    const fullKey = this.fullKey(key)

    const reply = await this.deps.client.eval(SET_IF_NOT_EXISTS, {
      keys: [fullKey, this.versionKey(fullKey)],
      arguments: [this.toBuffer(value), this.ttlArg(opts)],
    })

    return this.asString(reply) === "written" ? { kind: "written" } : { kind: "skipped" }
  }

  private asString(reply: unknown): string {
    if (Buffer.isBuffer(reply)) return reply.toString("utf8")
    if (typeof reply === "string" || typeof reply === "number") return String(reply)

    throw new TypeError(`Unexpected Redis reply: ${typeof reply}`)
  }

  private toResult(buffer: Buffer | null): KvResult<Uint8Array> {
    if (buffer === null) return { kind: "not_found" }

    return { kind: "found", value: new Uint8Array(buffer) }
  }

  private ttlArg(opts?: Partial<KvSetOptions>): string {
    return opts?.ttl ? String(opts.ttl.milliseconds) : ""
  }

  private toBuffer(value: Uint8Array): Buffer {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
  }

  private versionKey(fullKey: string): string {
    return `${fullKey}:v`
  }

  private fullKey(k: KvKey): string {
    return `${this.opts.keyspacePrefix}${k}`
  }
}
