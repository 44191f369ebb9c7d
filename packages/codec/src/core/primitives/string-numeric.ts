import type { Codec } from "../../ports/codec"
import { CodecError } from "../errors/codec-error"
import { err, ok } from "../result"
import { defineCodec } from "./define-codec"

/**
 * Declared target of a numeral carried inside a JSON string.
 *
 * - `int32` → `number`
 * - `int64` → `bigint`
 * - `float64` → `number`
 * - `decimal` → the numeral itself, validated but never converted, for
 *   arbitrary-precision producers
 */
export type NumericWidth = "int32" | "int64" | "float64" | "decimal"

const INTEGER = /^[+-]?\d+$/
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/

const INT_BOUNDS = {
  int32: { min: -(2n ** 31n), max: 2n ** 31n - 1n },
  int64: { min: -(2n ** 63n), max: 2n ** 63n - 1n },
} as const

function parseBigInt(text: string, width: "int32" | "int64"): bigint | CodecError {
  if (!INTEGER.test(text)) {
    return CodecError.invalidEncoding(`"${text}" is not an integer numeral`)
  }

  const value = BigInt(text)
  const { min, max } = INT_BOUNDS[width]
  if (value < min || value > max) return CodecError.outOfRange(text, width)

  return value
}

function inBounds(value: bigint, width: "int32" | "int64"): boolean {
  const { min, max } = INT_BOUNDS[width]
  return value >= min && value <= max
}

function int32Codec(): Codec<number> {
  return defineCodec<number>({
    name: "string-numeric:int32",
    lossy: true,
    decode: (wire) => {
      if (typeof wire !== "string") return err(CodecError.typeMismatch("int32 string", wire))

      const parsed = parseBigInt(wire, "int32")
      return parsed instanceof CodecError ? err(parsed) : ok(Number(parsed))
    },
    encode: (value) => {
      if (!Number.isInteger(value) || !inBounds(BigInt(value), "int32")) {
        throw CodecError.outOfRange(value, "int32")
      }

      return String(value)
    },
  })
}

function int64Codec(): Codec<bigint> {
  return defineCodec<bigint>({
    name: "string-numeric:int64",
    lossy: true,
    decode: (wire) => {
      if (typeof wire !== "string") return err(CodecError.typeMismatch("int64 string", wire))

      const parsed = parseBigInt(wire, "int64")
      return parsed instanceof CodecError ? err(parsed) : ok(parsed)
    },
    encode: (value) => {
      if (!inBounds(value, "int64")) throw CodecError.outOfRange(value, "int64")

      return value.toString()
    },
  })
}

function float64Codec(): Codec<number> {
  return defineCodec<number>({
    name: "string-numeric:float64",
    lossy: true,
    decode: (wire) => {
      if (typeof wire !== "string") {
        return err(CodecError.typeMismatch("float64 string", wire))
      }
      if (!DECIMAL.test(wire)) {
        return err(CodecError.invalidEncoding(`"${wire}" is not a decimal numeral`))
      }

      const value = Number(wire)
      return Number.isFinite(value) ? ok(value) : err(CodecError.outOfRange(wire, "float64"))
    },
    encode: (value) => {
      if (!Number.isFinite(value)) throw CodecError.outOfRange(value, "float64")

      return String(value)
    },
  })
}

function decimalCodec(): Codec<string> {
  return defineCodec<string>({
    name: "string-numeric:decimal",
    decode: (wire) => {
      if (typeof wire !== "string") {
        return err(CodecError.typeMismatch("decimal string", wire))
      }

      return DECIMAL.test(wire)
        ? ok(wire)
        : err(CodecError.invalidEncoding(`"${wire}" is not a decimal numeral`))
    },
    encode: (value) => {
      if (!DECIMAL.test(value)) {
        throw CodecError.invalidEncoding(`"${value}" is not a decimal numeral`)
      }

      return value
    },
  })
}

/**
 * Numeral carried as a JSON string to survive transports that would round it.
 * Always encodes back to a string, never a bare number. Overflow of the
 * declared width is an `out_of_range` error, never a truncation.
 */
export function stringNumeric(width: "int32" | "float64"): Codec<number>
export function stringNumeric(width: "int64"): Codec<bigint>
export function stringNumeric(width: "decimal"): Codec<string>
export function stringNumeric(
  width: NumericWidth,
): Codec<number> | Codec<bigint> | Codec<string> {
  switch (width) {
    case "int32":
      return int32Codec()
    case "int64":
      return int64Codec()
    case "float64":
      return float64Codec()
    case "decimal":
      return decimalCodec()
  }
}
