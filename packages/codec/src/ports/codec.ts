import type { CodecError } from "../core/errors/codec-error"
import type { Result } from "./result"
import type { WireInput, WireValue } from "./wire-value"

export type CodecResult<T> = Result<T, CodecError>

/**
 * Codec defines a bidirectional transformation between a wire value and one
 * canonical typed value `T`.
 *
 * @remarks
 * Codecs are pure, stateless and shared: one instance may back any number of
 * fields across any number of records.
 *
 * - `decode` receives `undefined` when the field is absent. Codecs that have no
 *   meaning for absence report a `type_mismatch` with `actual: "absent"`.
 * - `encode` returning `undefined` means "omit the key".
 * - `retain` describes declared lossy transforms: given a wire value, it returns
 *   what `encode(decode(wire))` is expected to produce. Codecs that reproduce
 *   their input exactly leave it out.
 *
 * @example
 * ```ts
 * const upper: Codec<string> = {
 *   name: "upper",
 *   decode: (wire) =>
 *     typeof wire === "string"
 *       ? ok(wire.toUpperCase())
 *       : err(CodecError.typeMismatch("string", wire)),
 *   encode: (value) => value,
 * }
 * ```
 */
export interface Codec<T> {
  /** Human-readable codec name, used in introspection and error messages. */
  readonly name: string

  decode(wire: WireInput): CodecResult<T>

  encode(value: T): WireInput

  retain?(wire: WireValue): WireValue
}

export type CodecValue<C> = C extends Codec<infer T> ? T : never
