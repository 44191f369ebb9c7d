/**
 * Whether a key arrived as a single string or as an array of strings.
 * Encode reproduces it so `{"Accept": "a"}` never comes back as
 * `{"Accept": ["a"]}`.
 */
export type MultiMapShape = "scalar" | "array"

export type MultiMapEntry = {
  readonly key: string
  readonly values: readonly string[]
  readonly shape: MultiMapShape
}

function normalize(name: string): string {
  return name.toLowerCase()
}

/**
 * Ordered multi-map with case-insensitive lookup, for header-like maps.
 *
 * Every wire key keeps its exact casing and shape. Keys that differ only in
 * case stay separate entries; `get()` concatenates their values in wire order.
 * Instances are immutable: `with()` and `without()` return new maps.
 */
export class CaseInsensitiveMultiMap {
  private readonly items: readonly MultiMapEntry[]
  private readonly index: ReadonlyMap<string, readonly number[]>

  private constructor(items: readonly MultiMapEntry[]) {
    this.items = items

    const index = new Map<string, number[]>()
    items.forEach((item, position) => {
      const name = normalize(item.key)
      const positions = index.get(name)
      if (positions) positions.push(position)
      else index.set(name, [position])
    })
    this.index = index
  }

  static empty(): CaseInsensitiveMultiMap {
    return new CaseInsensitiveMultiMap([])
  }

  /**
   * Builds a map from entries. Entries repeating an exact key are merged into
   * the first one, keeping its shape.
   */
  static from(entries: Iterable<MultiMapEntry>): CaseInsensitiveMultiMap {
    const merged: MultiMapEntry[] = []
    const positions = new Map<string, number>()

    for (const entry of entries) {
      const at = positions.get(entry.key)
      const existing = at === undefined ? undefined : merged[at]

      if (at !== undefined && existing) {
        merged[at] = { ...existing, values: [...existing.values, ...entry.values] }
      } else {
        positions.set(entry.key, merged.length)
        merged.push({ key: entry.key, values: [...entry.values], shape: entry.shape })
      }
    }

    return new CaseInsensitiveMultiMap(merged)
  }

  /**
   * Builds a map from a plain record, taking each key's shape from its value.
   */
  static fromRecord(
    record: Readonly<Record<string, string | readonly string[]>>,
  ): CaseInsensitiveMultiMap {
    return CaseInsensitiveMultiMap.from(
      Object.entries(record).map(([key, value]) =>
        typeof value === "string"
          ? { key, values: [value], shape: "scalar" }
          : { key, values: value, shape: "array" },
      ),
    )
  }

  /** Number of wire keys, counting case variants separately. */
  get size(): number {
    return this.items.length
  }

  has(name: string): boolean {
    return this.index.has(normalize(name))
  }

  /** All values under `name`, matched case-insensitively. */
  get(name: string): readonly string[] | undefined {
    const positions = this.index.get(normalize(name))
    if (!positions) return undefined

    return positions.flatMap((position) => this.items[position]?.values ?? [])
  }

  first(name: string): string | undefined {
    return this.get(name)?.[0]
  }

  shapeOf(name: string): MultiMapShape | undefined {
    const position = this.index.get(normalize(name))?.[0]
    return position === undefined ? undefined : this.items[position]?.shape
  }

  keys(): string[] {
    return this.items.map((item) => item.key)
  }

  entries(): readonly MultiMapEntry[] {
    return this.items
  }

  /**
   * Replaces every case variant of `name` with one entry. An existing key keeps
   * its position, casing and (unless `shape` is given) its shape; a new key is
   * appended with `array` shape unless `shape` says otherwise.
   */
  with(name: string, values: readonly string[], shape?: MultiMapShape): CaseInsensitiveMultiMap {
    const positions = this.index.get(normalize(name))
    const firstAt = positions?.[0]
    const current = firstAt === undefined ? undefined : this.items[firstAt]

    if (!positions || !current) {
      return new CaseInsensitiveMultiMap([
        ...this.items,
        { key: name, values: [...values], shape: shape ?? "array" },
      ])
    }

    const replacement: MultiMapEntry = {
      key: current.key,
      values: [...values],
      shape: shape ?? current.shape,
    }

    return new CaseInsensitiveMultiMap(
      this.items.flatMap((item, position) => {
        if (position === firstAt) return [replacement]
        return positions.includes(position) ? [] : [item]
      }),
    )
  }

  without(name: string): CaseInsensitiveMultiMap {
    const target = normalize(name)
    if (!this.index.has(target)) return this

    return new CaseInsensitiveMultiMap(this.items.filter((item) => normalize(item.key) !== target))
  }

  /**
   * Plain-record view in wire shape. A `scalar` entry that no longer holds
   * exactly one value is written as an array.
   */
  toRecord(): Record<string, string | string[]> {
    return Object.fromEntries(
      this.items.map((item): [string, string | string[]] => {
        const [only] = item.values
        return item.shape === "scalar" && item.values.length === 1 && only !== undefined
          ? [item.key, only]
          : [item.key, [...item.values]]
      }),
    )
  }
}
