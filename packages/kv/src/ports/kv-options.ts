import type { Milliseconds } from "@conduit/clock"

export type KvTtl = { kind: "milliseconds"; milliseconds: Milliseconds }

export interface KvSetOptions {
  /**
   * Real expiry, not a cache hint: the entry is gone once it elapses.
   */
  readonly ttl?: KvTtl
}
