import { isDeepStrictEqual } from "node:util"
import type { WireValue } from "../../ports/wire-value"
import type { RecordError } from "../errors/record-error"
import type { RecordDefinition } from "../record/define-record"
import { diffWire, type WireDifference } from "./diff-wire"

export type RoundTripStage = "decode" | "wire" | "redecode" | "fixed_point"

export type RoundTripReport<T> =
  | { readonly ok: true; readonly record: T; readonly encoded: WireValue }
  | { readonly ok: false; readonly stage: "decode" | "redecode"; readonly error: RecordError }
  | {
      readonly ok: false
      readonly stage: "wire"
      readonly differences: readonly WireDifference[]
    }
  | { readonly ok: false; readonly stage: "fixed_point"; readonly record: T; readonly redecoded: T }

/**
 * Decodes `wire`, encodes the result and checks that:
 *
 * 1. the encoding equals `wire` as retained by the definition (key order
 *    ignored), and
 * 2. decoding the encoding yields a record deep-equal to the first one.
 */
export function checkRoundTrip<T extends object>(
  definition: RecordDefinition<T>,
  wire: WireValue,
): RoundTripReport<T> {
  const decoded = definition.decode(wire)
  if (!decoded.ok) return { ok: false, stage: "decode", error: decoded.error }

  const encoded = definition.encode(decoded.value)
  const differences = diffWire(definition.retain(wire), encoded)
  if (differences.length > 0) return { ok: false, stage: "wire", differences }

  const redecoded = definition.decode(encoded)
  if (!redecoded.ok) return { ok: false, stage: "redecode", error: redecoded.error }

  if (!isDeepStrictEqual(redecoded.value, decoded.value)) {
    return { ok: false, stage: "fixed_point", record: decoded.value, redecoded: redecoded.value }
  }

  return { ok: true, record: decoded.value, encoded }
}
