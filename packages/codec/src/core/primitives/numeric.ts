import type { Codec } from "../../ports/codec"
import { CodecError } from "../errors/codec-error"
import { err, ok } from "../result"
import { defineCodec } from "./define-codec"

export type IntegerWidth = "int32" | "int64"

const INT32_MIN = -2_147_483_648
const INT32_MAX = 2_147_483_647

function checkInteger(value: number, width: IntegerWidth): CodecError | undefined {
  if (!Number.isInteger(value)) {
    return CodecError.invalidEncoding(`${value} is not an integer`)
  }

  if (width === "int32" && (value < INT32_MIN || value > INT32_MAX)) {
    return CodecError.outOfRange(value, "int32")
  }

  // JSON numbers above 2^53 have already lost digits by the time they get here.
  if (width === "int64" && !Number.isSafeInteger(value)) {
    return CodecError.outOfRange(value, "int64 (safe integer)")
  }

  return undefined
}

/**
 * Integer carried as a bare JSON number.
 */
export function integer(width: IntegerWidth): Codec<number> {
  return defineCodec<number>({
    name: width,
    decode: (wire) => {
      if (typeof wire !== "number") return err(CodecError.typeMismatch(width, wire))

      const problem = checkInteger(wire, width)
      return problem ? err(problem) : ok(wire)
    },
    encode: (value) => {
      const problem = checkInteger(value, width)
      if (problem) throw problem

      return value
    },
  })
}

const float64Codec = defineCodec<number>({
  name: "float64",
  decode: (wire) =>
    typeof wire === "number" ? ok(wire) : err(CodecError.typeMismatch("float64", wire)),
  encode: (value) => {
    if (!Number.isFinite(value)) throw CodecError.outOfRange(value, "float64")

    return value
  },
})

export function float64(): Codec<number> {
  return float64Codec
}
