import type { CodecResult } from "../../ports/codec"
import type { FieldSpec } from "../../ports/field-spec"
import { lookup, type WireObject } from "../../ports/wire-value"
import { err } from "../result"

/**
 * Reads one field out of a wire object. A failure comes back with the wire
 * key prepended to the error path.
 */
export function applyField<T>(document: WireObject, spec: FieldSpec<T>): CodecResult<T> {
  const decoded = spec.codec.decode(lookup(document, spec.wireKey))

  return decoded.ok ? decoded : err(decoded.error.at(spec.wireKey))
}
