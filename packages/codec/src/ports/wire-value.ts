export type WireScalar = string | number | boolean | null

export type WireArray = readonly WireValue[]

export type WireObject = { readonly [key: string]: WireValue }

/**
 * A structurally parsed JSON value, before any typed interpretation.
 */
export type WireValue = WireScalar | WireArray | WireObject

/**
 * The result of looking a key up in a wire object.
 *
 * `undefined` means the key is absent, which is never the same thing as a key
 * holding `null`.
 */
export type WireInput = WireValue | undefined

export type WireKind = "absent" | "null" | "string" | "number" | "boolean" | "array" | "object"

export function isWireArray(value: WireInput): value is WireArray {
  return Array.isArray(value)
}

export function isWireObject(value: WireInput): value is WireObject {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function wireKind(value: WireInput): WireKind {
  if (value === undefined) return "absent"
  if (value === null) return "null"
  if (isWireArray(value)) return "array"
  if (isWireObject(value)) return "object"

  switch (typeof value) {
    case "string":
      return "string"
    case "number":
      return "number"
    default:
      return "boolean"
  }
}

/**
 * Own-property lookup: inherited keys such as `constructor` count as absent.
 */
export function lookup(object: WireObject, key: string): WireInput {
  return Object.hasOwn(object, key) ? object[key] : undefined
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Type guard for values coming out of `JSON.parse` or any other untyped source.
 *
 * Rejects `undefined`, functions, symbols, bigints, non-finite numbers and
 * class instances such as `Date` or `Map`.
 */
export function isWireValue(value: unknown): value is WireValue {
  switch (typeof value) {
    case "string":
    case "boolean":
      return true
    case "number":
      return Number.isFinite(value)
    case "object":
      if (value === null) return true
      if (Array.isArray(value)) return value.every((item) => isWireValue(item))
      if (!isPlainObject(value)) return false
      return Object.values(value).every((item) => isWireValue(item))
    default:
      return false
  }
}
