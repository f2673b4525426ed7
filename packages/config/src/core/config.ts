import type { IConfig } from "../ports/config"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly loadedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): T {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  keys(): (keyof T & string)[] {
    return Object.keys(this.data).filter((k): k is keyof T & string => k in this.data)
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance.get(key) ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(this.provenance.values())]
  }

  unknownKeys(): string[] {
    const declared = new Set<string>(this.keys())

    return [...this.loadedKeys].filter((k) => !declared.has(k))
  }
}
