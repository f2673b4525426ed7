/**
 * Recognizes and parses a branded id where data crosses a boundary
 * (request params, stored records, webhook payloads).
 *
 * @example
 * ```ts
 * type JobId = Brand<string, "JobId">
 *
 * const JobId = prefixedId<JobId>({ kind: "JobId", prefix: "job" })
 *
 * JobId.is(c.req.param("id")) // narrows to JobId
 * ```
 */
export interface IdType<T> {
  /** Name used in error messages. */
  readonly kind: string

  /** @throws TypeError if `value` is not a valid id of this kind */
  parse(value: unknown): T

  is(value: unknown): value is T
}
