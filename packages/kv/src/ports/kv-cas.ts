import type { KvNotFound } from "./kv-result"

/**
 * Opaque version token. Only meaningful for comparing against the same key.
 */
export type KvVersion = string

export type KvFoundVersioned<T> = {
  readonly kind: "found"
  readonly value: T
  readonly version: KvVersion
}

export type KvResultVersioned<T> = KvFoundVersioned<T> | KvNotFound

export type KvCasResult =
  | { readonly kind: "written"; readonly version: KvVersion }
  | { readonly kind: "conflict" }
  | { readonly kind: "not_found" }
