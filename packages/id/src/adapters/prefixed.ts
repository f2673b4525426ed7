import { type IdCodec, withGenerator } from "../core/id-codec"
import type { IdType } from "../core/id-type"
import type { IdGenerator } from "../ports/id-generator"
import { uuidV7 } from "./uuid"

export type PrefixedIdOptions = {
  kind: string

  /** Joined to the inner id with an underscore, e.g. `job_<uuid>`. */
  prefix: string

  /** Must produce lowercase UUIDs. Default: uuidV7 */
  inner?: IdGenerator<string>
}

const UUID = "[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}"

export function prefixedId<T extends string>(opts: PrefixedIdOptions): IdCodec<T> {
  const { kind, prefix, inner = uuidV7 } = opts
  const pattern = new RegExp(`^${prefix}_${UUID}$`)

  const is = (value: unknown): value is T =>
    typeof value === "string" && pattern.test(value)

  const type: IdType<T> = {
    kind,
    is,
    parse(value) {
      if (!is(value)) throw new TypeError(`Invalid ${kind}: ${String(value)}`)

      return value
    },
  }

  return withGenerator(type, {
    generate: () => type.parse(`${prefix}_${inner.generate()}`),
  })
}
