import type { Clock } from "@conduit/clock"
import { CodecKeyValueStore } from "../../core/codec/codec-kv-store"
import type { Codec } from "../../ports/codec"
import type { KeyValueStore } from "../../ports/kv-store"
import { MemoryBytesKeyValueStore, type MemoryKvStoreOptions } from "./memory-bytes-kv-store"

export type MemoryKvBundleOptions = {
  clock: Clock
  opts?: MemoryKvStoreOptions
}

export function createMemoryBytesKeyValueStore(
  options: MemoryKvBundleOptions,
): MemoryBytesKeyValueStore {
  return new MemoryBytesKeyValueStore({ clock: options.clock }, options.opts)
}

export function createMemoryKeyValueStore<T>(
  options: MemoryKvBundleOptions & { codec: Codec<T> },
): KeyValueStore<T> {
  return new CodecKeyValueStore({
    bytesStore: createMemoryBytesKeyValueStore(options),
    codec: options.codec,
  })
}
