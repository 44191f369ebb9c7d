/**
 * Validated configuration with per-key provenance.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: harnessEnvSchema,
 *   sources: [new JsonSource({ file: "wirecodec.json", required: false }), new EnvSource()],
 * })
 *
 * config.value.SAMPLES_DIR      // "samples"
 * config.explain("SAMPLES_DIR") // "json:wirecodec.json"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  /**
   * Explains which source provided the final value for a key, or
   * `"default"` when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Returns the names of all sources that contributed at least one value.
   */
  sourcesUsed(): string[]

  /**
   * Returns keys present in sources but not defined in the schema.
   *
   * Useful for detecting typos such as `WIRECODEC_FAMILY`.
   */
  unknownKeys(): string[]
}
