export * from "./array-of"
export * from "./base64"
export * from "./boolean"
export * from "./define-codec"
export * from "./delimited-list"
export * from "./map-of"
export * from "./multi-map"
export * from "./numeric"
export * from "./optional"
export * from "./string"
export * from "./string-numeric"
export * from "./timestamp"
