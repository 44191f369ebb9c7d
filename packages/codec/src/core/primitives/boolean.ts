import type { Codec } from "../../ports/codec"
import { CodecError } from "../errors/codec-error"
import { err, ok } from "../result"
import { defineCodec } from "./define-codec"

export type BooleanWireForm = "boolean" | "string"

export type BooleanOptions = {
  /** Wire forms accepted on decode. Default: `["boolean"]`. */
  accept?: readonly BooleanWireForm[]

  /** Wire form written on encode. Default: `"boolean"`. */
  encodeAs?: BooleanWireForm
}

export function boolean(options: BooleanOptions = {}): Codec<boolean> {
  const accept = options.accept ?? ["boolean"]
  const encodeAs = options.encodeAs ?? "boolean"
  const acceptsStrings = accept.includes("string")
  const expected = acceptsStrings ? "boolean or boolean string" : "boolean"

  return defineCodec<boolean>({
    name: `boolean:${encodeAs}`,
    lossy: accept.some((form) => form !== encodeAs),
    decode: (wire) => {
      if (typeof wire === "boolean" && accept.includes("boolean")) return ok(wire)

      if (typeof wire === "string" && acceptsStrings) {
        if (wire === "true") return ok(true)
        if (wire === "false") return ok(false)

        return err(CodecError.invalidEncoding(`"${wire}" is not "true" or "false"`))
      }

      return err(CodecError.typeMismatch(expected, wire))
    },
    encode: (value) => (encodeAs === "string" ? String(value) : value),
  })
}
