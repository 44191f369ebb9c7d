import type { Codec } from "./codec"

/**
 * - `required`: absent fails the record
 * - `optional`: absent decodes to `undefined` and is omitted on encode,
 *   `null` stays `null`
 * - `defaulted`: absent decodes to a declared default
 */
export type Presence = "required" | "optional" | "defaulted"

/**
 * Binding of one record field to its wire key and codec.
 *
 * The codec already carries the absent/null policy of the field; `presence`
 * records which policy was chosen so tooling can enumerate fields by kind.
 */
export interface FieldSpec<T, P extends Presence = Presence> {
  readonly wireKey: string
  readonly presence: P
  readonly codec: Codec<T>
}

/**
 * A FieldSpec together with the canonical property name it populates.
 */
export interface FieldDescriptor extends FieldSpec<unknown> {
  readonly name: string
}

export type FieldMap = { readonly [name: string]: FieldSpec<unknown> }
