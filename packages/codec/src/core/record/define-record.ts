import type { Codec, CodecResult } from "../../ports/codec"
import type { FieldDescriptor, FieldMap } from "../../ports/field-spec"
import type { Result } from "../../ports/result"
import {
  isWireObject,
  lookup,
  type WireInput,
  type WireObject,
  type WireValue,
} from "../../ports/wire-value"
import { CodecError } from "../errors/codec-error"
import { RecordError } from "../errors/record-error"
import { applyField } from "../fields/apply-field"
import { retainOf } from "../primitives/optional"
import { err, ok } from "../result"
import type { RecordOf } from "./record-types"

export type RecordResult<T> = Result<T, RecordError>

export type RecordType<D> = D extends RecordDefinition<infer T> ? T : never

/**
 * Named, ordered table of fields that decodes a wire object into a typed
 * record and encodes it back.
 *
 * @remarks
 * Decoding is atomic and stops at the first failing field, in declaration
 * order. Wire keys the table does not name are ignored on decode and are not
 * reproduced on encode.
 */
export class RecordDefinition<T extends object> {
  readonly name: string
  readonly fields: readonly FieldDescriptor[]
  readonly codec: Codec<T>

  constructor(name: string, fields: FieldMap) {
    this.name = name
    this.fields = Object.freeze(
      Object.entries(fields).map(([field, spec]) => Object.freeze({ ...spec, name: field })),
    )

    this.codec = Object.freeze({
      name: `record:${name}`,
      decode: (wire: WireInput) => this.decodeFields(wire),
      encode: (value: T) => this.encode(value),
      retain: (wire: WireValue) => this.retain(wire),
    })
  }

  decode(wire: WireInput): RecordResult<T> {
    const decoded = this.decodeFields(wire)
    return decoded.ok ? decoded : err(new RecordError(this.name, decoded.error))
  }

  decodeOrThrow(wire: WireInput): T {
    const decoded = this.decode(wire)
    if (!decoded.ok) throw decoded.error

    return decoded.value
  }

  /**
   * Emits the declared wire keys in declaration order. Fields whose codec
   * encodes to absent are left out; `null` is written as `null`.
   */
  encode(record: T): WireObject {
    const entries: [string, WireValue][] = []

    for (const field of this.fields) {
      const value: unknown = Reflect.get(record, field.name)
      const encoded = field.codec.encode(value)
      if (encoded !== undefined) entries.push([field.wireKey, encoded])
    }

    return Object.fromEntries(entries)
  }

  /**
   * The part of `wire` that `encode(decode(wire))` reproduces: unknown keys
   * dropped, defaults of absent fields materialized, lossy values re-rendered.
   */
  retain(wire: WireValue): WireValue {
    if (!isWireObject(wire)) return wire

    const entries: [string, WireValue][] = []

    for (const field of this.fields) {
      const value = lookup(wire, field.wireKey)

      if (value !== undefined) {
        entries.push([field.wireKey, retainOf(field.codec, value)])
        continue
      }

      const fallback = field.codec.decode(undefined)
      const encoded = fallback.ok ? field.codec.encode(fallback.value) : undefined
      if (encoded !== undefined) entries.push([field.wireKey, encoded])
    }

    return Object.fromEntries(entries)
  }

  private decodeFields(wire: WireInput): CodecResult<T> {
    if (!isWireObject(wire)) return err(CodecError.typeMismatch("object", wire))

    const entries: [string, unknown][] = []

    for (const field of this.fields) {
      const decoded = applyField(wire, field)
      if (!decoded.ok) return decoded
      if (decoded.value !== undefined) entries.push([field.name, decoded.value])
    }

    // Each entry was produced by the codec declared for that property.
    return ok(Object.fromEntries(entries) as T)
  }
}

/**
 * Declares a record type from a map of property name to field.
 *
 * @example
 * ```ts
 * const Bucket = defineRecord("S3Bucket", {
 *   name: required("name", string()),
 *   arn: required("arn", string()),
 *   ownerIdentity: optional("ownerIdentity", UserIdentity.codec),
 * })
 *
 * type Bucket = RecordType<typeof Bucket>
 * ```
 */
export function defineRecord<F extends FieldMap>(
  name: string,
  fields: F,
): RecordDefinition<RecordOf<F>> {
  return new RecordDefinition(name, fields)
}
