import type { Codec } from "../../ports/codec"
import { isWireObject, type WireValue } from "../../ports/wire-value"
import { CodecError } from "../errors/codec-error"
import { err, ok } from "../result"
import { retainOf } from "./optional"

/**
 * String-keyed map of `item`, in wire key order. A failing value reports its
 * key in the path. Entries that encode to absent are left out.
 */
export function mapOf<T>(item: Codec<T>): Codec<Readonly<Record<string, T>>> {
  return Object.freeze({
    name: `map:${item.name}`,
    decode(wire) {
      if (!isWireObject(wire)) return err(CodecError.typeMismatch("object", wire))

      const entries: [string, T][] = []
      for (const [key, value] of Object.entries(wire)) {
        const decoded = item.decode(value)
        if (!decoded.ok) return err(decoded.error.at(key))
        entries.push([key, decoded.value])
      }

      return ok(Object.fromEntries(entries))
    },
    encode(map) {
      const entries: [string, WireValue][] = []
      for (const [key, value] of Object.entries(map)) {
        const encoded = item.encode(value)
        if (encoded !== undefined) entries.push([key, encoded])
      }

      return Object.fromEntries(entries)
    },
    ...(item.retain && {
      retain(wire: WireValue): WireValue {
        if (!isWireObject(wire)) return wire

        return Object.fromEntries(
          Object.entries(wire).map(([key, value]) => [key, retainOf(item, value)]),
        )
      },
    }),
  } satisfies Codec<Readonly<Record<string, T>>>)
}
