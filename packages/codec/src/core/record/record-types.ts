import type { FieldMap, FieldSpec, Presence } from "../../ports/field-spec"

type Simplify<T> = { [K in keyof T]: T[K] } & {}

type FieldValue<S> = S extends FieldSpec<infer T, Presence> ? T : never

type OptionalNames<F extends FieldMap> = {
  [K in keyof F]: F[K] extends FieldSpec<unknown, "optional"> ? K : never
}[keyof F]

type RequiredNames<F extends FieldMap> = Exclude<keyof F, OptionalNames<F>>

/**
 * The typed record a field map decodes to. Optional fields become optional
 * properties; required and defaulted fields are always present.
 */
export type RecordOf<F extends FieldMap> = Simplify<
  { readonly [K in RequiredNames<F>]: FieldValue<F[K]> } & {
    readonly [K in OptionalNames<F>]?: Exclude<FieldValue<F[K]>, undefined>
  }
>
