import type { Codec } from "@conduit/kv"
import superjson from "superjson"

const decoder = new TextDecoder()

/** JSON codec that keeps Dates intact across a round trip through storage. */
export function createJsonCodec<T>(): Codec<T> {
  return {
    encode: (value: T) => Buffer.from(superjson.stringify(value), "utf8"),
    decode: (data: Uint8Array) => superjson.parse<T>(decoder.decode(data)),
  }
}
