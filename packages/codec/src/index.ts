export type * from "./ports/codec"
export type * from "./ports/field-spec"
export type * from "./ports/result"
export * from "./ports/wire-value"

export * from "./core/errors/codec-error"
export * from "./core/errors/path"
export * from "./core/errors/record-error"
export * from "./core/fields"
export * from "./core/multimap/case-insensitive-multi-map"
export * from "./core/primitives"
export * from "./core/record"
export * from "./core/result"
export * from "./core/roundtrip"
