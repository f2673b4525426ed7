/**
 * Validated configuration plus where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ SERVER_PORT: z.coerce.number().default(4670) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("SERVER_PORT")     // 4670
 * config.explain("SERVER_PORT") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /** Name of the source that supplied `key`, or "default" for schema defaults. */
  explain<K extends keyof T & string>(key: K): string

  /** Sources that supplied at least one value, in application order. */
  sourcesUsed(): string[]

  /** Keys present in the sources but not declared by the schema. */
  unknownKeys(): string[]
}
