export * from "./define-record"
export type * from "./record-types"
