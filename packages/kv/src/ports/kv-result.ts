export type KvFound<T> = {
  readonly kind: "found"
  readonly value: T
}

export type KvNotFound = {
  readonly kind: "not_found"
}

/**
 * A miss means the key does not exist, not that it was evicted.
 */
export type KvResult<T> = KvFound<T> | KvNotFound
