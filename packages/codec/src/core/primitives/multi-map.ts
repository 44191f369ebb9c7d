import type { Codec, CodecResult } from "../../ports/codec"
import { isWireArray, isWireObject, type WireInput } from "../../ports/wire-value"
import { CodecError } from "../errors/codec-error"
import { CaseInsensitiveMultiMap, type MultiMapEntry } from "../multimap/case-insensitive-multi-map"
import { err, ok } from "../result"
import { defineCodec } from "./define-codec"

function decodeEntry(key: string, value: WireInput): CodecResult<MultiMapEntry> {
  if (typeof value === "string") return ok({ key, values: [value], shape: "scalar" })

  if (!isWireArray(value)) {
    return err(CodecError.typeMismatch("string or string array", value).at(key))
  }

  const values: string[] = []
  for (const [position, item] of value.entries()) {
    if (typeof item !== "string") {
      return err(CodecError.typeMismatch("string", item).at(key, position))
    }
    values.push(item)
  }

  return ok({ key, values, shape: "array" })
}

const multiMapCodec = defineCodec<CaseInsensitiveMultiMap>({
  name: "multi-map",
  decode: (wire) => {
    if (!isWireObject(wire)) return err(CodecError.typeMismatch("object", wire))

    const entries: MultiMapEntry[] = []
    for (const [key, value] of Object.entries(wire)) {
      const entry = decodeEntry(key, value)
      if (!entry.ok) return entry
      entries.push(entry.value)
    }

    return ok(CaseInsensitiveMultiMap.from(entries))
  },
  encode: (map) => map.toRecord(),
})

/**
 * Header-like object whose values are a string or an array of strings.
 * Lookup is case-insensitive; each key's scalar/array shape survives encode.
 */
export function multiMap(): Codec<CaseInsensitiveMultiMap> {
  return multiMapCodec
}
