import type { Codec } from "../../ports/codec"
import type { WireValue } from "../../ports/wire-value"
import { CodecError } from "../errors/codec-error"
import { err, ok } from "../result"
import { defineCodec } from "./define-codec"

const stringCodec = defineCodec<string>({
  name: "string",
  decode: (wire) =>
    typeof wire === "string" ? ok(wire) : err(CodecError.typeMismatch("string", wire)),
  encode: (value) => value,
})

const jsonCodec = defineCodec<WireValue>({
  name: "json",
  decode: (wire) =>
    wire === undefined ? err(CodecError.typeMismatch("json value", wire)) : ok(wire),
  encode: (value) => value,
})

export function string(): Codec<string> {
  return stringCodec
}

/**
 * Passthrough for free-form payloads (`detail`, authorizer context) that the
 * record does not interpret.
 */
export function json(): Codec<WireValue> {
  return jsonCodec
}
