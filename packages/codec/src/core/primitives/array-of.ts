import type { Codec } from "../../ports/codec"
import { isWireArray, type WireValue } from "../../ports/wire-value"
import { CodecError } from "../errors/codec-error"
import { err, ok } from "../result"
import { retainOf } from "./optional"

/**
 * Ordered list of `item`. A failing element reports its index in the path.
 */
export function arrayOf<T>(item: Codec<T>): Codec<readonly T[]> {
  return Object.freeze({
    name: `array:${item.name}`,
    decode(wire) {
      if (!isWireArray(wire)) return err(CodecError.typeMismatch("array", wire))

      const values: T[] = []
      for (const [index, element] of wire.entries()) {
        const decoded = item.decode(element)
        if (!decoded.ok) return err(decoded.error.at(index))
        values.push(decoded.value)
      }

      return ok(values)
    },
    encode(values) {
      return values.map((value): WireValue => item.encode(value) ?? null)
    },
    ...(item.retain && {
      retain(wire: WireValue): WireValue {
        return isWireArray(wire) ? wire.map((element) => retainOf(item, element)) : wire
      },
    }),
  } satisfies Codec<readonly T[]>)
}
