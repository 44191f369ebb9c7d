export * from "./forwarded-for"
export * from "./request-body"
