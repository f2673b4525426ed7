/**
 * Loads raw configuration values. No validation, coercion or merging happens
 * here; later sources override earlier ones and the schema does the rest.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env" or "dotenv:.env.production". */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
