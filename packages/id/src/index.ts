export { type PrefixedIdOptions, prefixedId } from "./adapters/prefixed"
export { uuidV4, uuidV7 } from "./adapters/uuid"
export type { Brand } from "./core/brand"
export { type IdCodec, withGenerator } from "./core/id-codec"
export type { IdType } from "./core/id-type"
export type { IdGenerator } from "./ports/id-generator"
