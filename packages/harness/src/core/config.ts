import type { IConfig } from "../ports/config"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly mergedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): T {
    return this.data
  }

  keys(): (keyof T & string)[] {
    return Object.keys(this.data) as Array<keyof T & string>
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }

  unknownKeys(): string[] {
    const used = new Set<string>(this.keys())

    return [...this.mergedKeys].filter((key) => !used.has(key))
  }
}
