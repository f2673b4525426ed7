import { z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  /** Classic or `zod/mini` schema. */
  schema: z.core.$ZodType<T>

  /** @default [new EnvSource()] */
  sources?: ConfigSource[]
}

export class ConfigValidationError extends Error {
  override readonly name = "ConfigValidationError"
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance = new Map<string, string>()

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance.set(key, source.name)
    }
  }

  const result = z.safeParse(schema, merged)

  if (!result.success) {
    throw new ConfigValidationError(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
    )
  }

  const declared = new Set(Object.keys(result.data))

  for (const key of provenance.keys()) {
    if (!declared.has(key)) provenance.delete(key)
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}
