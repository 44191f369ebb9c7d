import type { Codec } from "../../ports/codec"
import type { FieldSpec } from "../../ports/field-spec"
import { optionalOf } from "../primitives/optional"

export type DefaultedOptions = {
  nullIsDefault?: boolean
}

/**
 * Field that must be present. Absent fails the record with a
 * `type_mismatch` whose `actual` is `absent`.
 */
export function required<T>(wireKey: string, codec: Codec<T>): FieldSpec<T, "required"> {
  return Object.freeze({ wireKey, presence: "required", codec })
}

/**
 * Field that may be absent (decodes to `undefined`, omitted on encode) or
 * `null` (kept as `null`).
 */
export function optional<T>(
  wireKey: string,
  codec: Codec<T>,
): FieldSpec<T | null | undefined, "optional"> {
  return Object.freeze({ wireKey, presence: "optional", codec: optionalOf(codec) })
}

/**
 * Field that decodes to `fallback` when absent, and when `null` too if
 * `nullIsDefault` is set. Encode always writes the key.
 */
export function defaulted<T>(
  wireKey: string,
  codec: Codec<T>,
  fallback: T,
  options: DefaultedOptions & { nullIsDefault: true },
): FieldSpec<T, "defaulted">
export function defaulted<T>(
  wireKey: string,
  codec: Codec<T>,
  fallback: T,
  options?: DefaultedOptions,
): FieldSpec<T | null, "defaulted">
export function defaulted<T>(
  wireKey: string,
  codec: Codec<T>,
  fallback: T,
  options: DefaultedOptions = {},
): FieldSpec<T | null, "defaulted"> {
  return Object.freeze({
    wireKey,
    presence: "defaulted",
    codec: optionalOf(codec, { default: fallback, nullIsDefault: options.nullIsDefault ?? false }),
  })
}
