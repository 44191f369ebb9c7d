export * from "./check-round-trip"
export * from "./diff-wire"
