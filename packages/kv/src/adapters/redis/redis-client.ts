export type RedisSetOptions = {
  PX?: number
  KEEPTTL?: true
  NX?: true
}

export type RedisEvalOptions = { keys: string[]; arguments: (string | Buffer)[] }

/**
 * The slice of a node-redis v5 client, with blob strings mapped to Buffer,
 * that the kv and lock adapters use.
 */
export type RedisBytesClient = {
  get(key: string): Promise<Buffer | null>
  mGet(keys: readonly string[]): Promise<(Buffer | null)[]>
  exists(keys: string | readonly string[]): Promise<number>
  set(key: string, value: string | Uint8Array, opts?: RedisSetOptions): Promise<string | null>
  del(keys: string | readonly string[]): Promise<number>
  eval(script: string, opts: RedisEvalOptions): Promise<unknown>

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  readonly isOpen: boolean
}
