export type DeepPartial<T> = {
  [P in keyof T]?: (T[P] extends object ? DeepPartial<T[P]> | T[P] : T[P]) | undefined
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false

  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function mergeRecords(
  base: Record<string, unknown>,
  overrides: Record<string, unknown>,
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base }

  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue

    const current = base[key]
    out[key] = isPlainObject(current) && isPlainObject(value) ? mergeRecords(current, value) : value
  }

  return out
}

/**
 * Swaps parts of an object graph, typically test doubles into an app context.
 *
 * Plain objects are deep-merged. Class instances, arrays and functions are
 * replaced as a whole. `undefined` never overrides.
 */
export function applyOverrides<T extends object>(base: T, overrides?: DeepPartial<T>): T {
  if (!overrides || !isPlainObject(base) || !isPlainObject(overrides)) return base

  // The merge keeps every key of `base` and only replaces values with
  // overrides typed against the same keys.
  return mergeRecords(base, overrides) as T
}
