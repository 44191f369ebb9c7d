export * from "./apply-field"
export * from "./field-builders"
