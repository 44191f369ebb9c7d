export * from "./core/attribute-value"
export * from "./core/families"
export * from "./core/helpers"
export * from "./core/registry"
