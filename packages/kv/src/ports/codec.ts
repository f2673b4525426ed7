/**
 * Bidirectional transform between a typed value and bytes.
 *
 * @remarks
 * Codecs sit between typed store usage and byte-oriented adapters. Adapters
 * treat codec output as opaque and never import codecs themselves.
 *
 * Plain JSON loses `Date`, `Map`, `Set` and `BigInt`. Use a codec that
 * preserves them (superjson) when stored records carry such fields.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
