import {
  arrayOf,
  base64,
  boolean,
  type Codec,
  CodecError,
  type CodecResult,
  err,
  isWireObject,
  lookup,
  mapOf,
  ok,
  retainOf,
  string,
  stringNumeric,
  type WireInput,
  type WireObject,
  type WireValue,
} from "@wirecodec/codec"

/**
 * A change-stream attribute: a single-key object whose key names the type.
 *
 * Numbers (`N`, `NS`) stay decimal strings so no precision is lost; binary
 * values (`B`, `BS`) are decoded to bytes.
 */
export type AttributeValue =
  | { readonly kind: "S"; readonly value: string }
  | { readonly kind: "N"; readonly value: string }
  | { readonly kind: "B"; readonly value: Uint8Array }
  | { readonly kind: "SS"; readonly value: readonly string[] }
  | { readonly kind: "NS"; readonly value: readonly string[] }
  | { readonly kind: "BS"; readonly value: readonly Uint8Array[] }
  | { readonly kind: "M"; readonly value: Readonly<Record<string, AttributeValue>> }
  | { readonly kind: "L"; readonly value: readonly AttributeValue[] }
  | { readonly kind: "NULL"; readonly value: true }
  | { readonly kind: "BOOL"; readonly value: boolean }

export type AttributeKind = AttributeValue["kind"]

const nullMarker: Codec<true> = Object.freeze({
  name: "null-marker",
  decode: (wire: WireInput): CodecResult<true> => {
    if (wire === true) return ok(true)
    if (typeof wire === "boolean") return err(CodecError.invalidEncoding("NULL must be true"))

    return err(CodecError.typeMismatch("true", wire))
  },
  encode: (value: true): WireInput => value,
})

const attributeValueCodec: Codec<AttributeValue> = Object.freeze({
  name: "attribute-value",
  decode: (wire: WireInput) => decodeAttribute(wire),
  encode: (value: AttributeValue) => encodeAttribute(value),
  retain: (wire: WireValue) => retainAttribute(wire),
})

const codecs = {
  S: string(),
  N: stringNumeric("decimal"),
  B: base64(),
  SS: arrayOf(string()),
  NS: arrayOf(stringNumeric("decimal")),
  BS: arrayOf(base64()),
  M: mapOf(attributeValueCodec),
  L: arrayOf(attributeValueCodec),
  NULL: nullMarker,
  BOOL: boolean(),
} as const

function isAttributeKind(tag: string): tag is AttributeKind {
  return Object.hasOwn(codecs, tag)
}

function tagged<T>(
  kind: AttributeKind,
  result: CodecResult<T>,
  build: (value: T) => AttributeValue,
): CodecResult<AttributeValue> {
  return result.ok ? ok(build(result.value)) : err(result.error.at(kind))
}

function soleKey(wire: WireObject): string | CodecError {
  const keys = Object.keys(wire)
  const [tag] = keys

  if (keys.length !== 1 || tag === undefined) {
    return CodecError.invalidEncoding(
      `attribute value must hold exactly one type key, got ${keys.length}`,
    )
  }

  return tag
}

function decodeAttribute(wire: WireInput): CodecResult<AttributeValue> {
  if (!isWireObject(wire)) return err(CodecError.typeMismatch("attribute value", wire))

  const tag = soleKey(wire)
  if (tag instanceof CodecError) return err(tag)
  if (!isAttributeKind(tag)) {
    return err(CodecError.invalidEncoding(`unknown attribute type "${tag}"`))
  }

  const inner = lookup(wire, tag)

  switch (tag) {
    case "S":
      return tagged(tag, codecs.S.decode(inner), (value) => ({ kind: "S", value }))
    case "N":
      return tagged(tag, codecs.N.decode(inner), (value) => ({ kind: "N", value }))
    case "B":
      return tagged(tag, codecs.B.decode(inner), (value) => ({ kind: "B", value }))
    case "SS":
      return tagged(tag, codecs.SS.decode(inner), (value) => ({ kind: "SS", value }))
    case "NS":
      return tagged(tag, codecs.NS.decode(inner), (value) => ({ kind: "NS", value }))
    case "BS":
      return tagged(tag, codecs.BS.decode(inner), (value) => ({ kind: "BS", value }))
    case "M":
      return tagged(tag, codecs.M.decode(inner), (value) => ({ kind: "M", value }))
    case "L":
      return tagged(tag, codecs.L.decode(inner), (value) => ({ kind: "L", value }))
    case "NULL":
      return tagged(tag, codecs.NULL.decode(inner), (value) => ({ kind: "NULL", value }))
    case "BOOL":
      return tagged(tag, codecs.BOOL.decode(inner), (value) => ({ kind: "BOOL", value }))
  }
}

function single(kind: AttributeKind, encoded: WireInput): WireObject {
  return Object.fromEntries([[kind, encoded ?? null]])
}

function encodeAttribute(attribute: AttributeValue): WireObject {
  switch (attribute.kind) {
    case "S":
      return single("S", codecs.S.encode(attribute.value))
    case "N":
      return single("N", codecs.N.encode(attribute.value))
    case "B":
      return single("B", codecs.B.encode(attribute.value))
    case "SS":
      return single("SS", codecs.SS.encode(attribute.value))
    case "NS":
      return single("NS", codecs.NS.encode(attribute.value))
    case "BS":
      return single("BS", codecs.BS.encode(attribute.value))
    case "M":
      return single("M", codecs.M.encode(attribute.value))
    case "L":
      return single("L", codecs.L.encode(attribute.value))
    case "NULL":
      return single("NULL", codecs.NULL.encode(attribute.value))
    case "BOOL":
      return single("BOOL", codecs.BOOL.encode(attribute.value))
  }
}

function retainAttribute(wire: WireValue): WireValue {
  if (!isWireObject(wire)) return wire

  const tag = soleKey(wire)
  const inner = typeof tag === "string" ? lookup(wire, tag) : undefined
  if (typeof tag !== "string" || !isAttributeKind(tag) || inner === undefined) return wire

  const codec: Codec<unknown> = codecs[tag]
  return single(tag, retainOf(codec, inner))
}

/**
 * Tagged codec for change-stream attribute values, recursive through `M` and
 * `L`. A failure inside a value reports the type key in its path.
 */
export function attributeValue(): Codec<AttributeValue> {
  return attributeValueCodec
}

/**
 * Codec for an item image: attribute name to attribute value.
 */
export function attributeMap(): Codec<Readonly<Record<string, AttributeValue>>> {
  return codecs.M
}
