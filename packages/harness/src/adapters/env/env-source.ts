import type { ConfigSource } from "../../ports/source"

export const DEFAULT_ENV_PREFIX = "WIRECODEC_"

export type EnvSourceOptions = {
  /** Only keys starting with the prefix are read, with the prefix removed. Default: `WIRECODEC_` */
  prefix?: string
  env?: Record<string, string | undefined>
}

/**
 * Environment variables as configuration. A blank value counts as unset, so
 * `WIRECODEC_FAMILIES=` falls back to the file or the schema default.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? DEFAULT_ENV_PREFIX
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value === undefined || value.trim() === "") continue
      if (!key.startsWith(this.prefix) || key === this.prefix) continue

      values[key.slice(this.prefix.length)] = value
    }

    return values
  }
}
