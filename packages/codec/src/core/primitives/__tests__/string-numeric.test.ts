import { CodecError } from "../../errors/codec-error"
import { stringNumeric } from "../string-numeric"

describe("stringNumeric", () => {
  describe("int32", () => {
    const codec = stringNumeric("int32")

    it("decodes to a number", () => {
      expect(codec.decode("-42")).toEqual({ ok: true, value: -42 })
    })

    it("encodes back to a string", () => {
      expect(codec.encode(42)).toBe("42")
    })

    it("reports overflow as out_of_range", () => {
      const result = codec.decode("2147483648")

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.detail).toEqual({
          code: "out_of_range",
          value: "2147483648",
          bound: "int32",
        })
      }
    })

    it("reports a fractional numeral as invalid_encoding", () => {
      const result = codec.decode("4.2")

      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.message).toBe('"4.2" is not an integer numeral')
    })

    it("rejects a bare JSON number", () => {
      const result = codec.decode(42)

      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe("type_mismatch")
    })

    it("throws when asked to encode a value outside int32", () => {
      expect(() => codec.encode(2 ** 31)).toThrow(CodecError)
    })

    it("retains the canonical numeral", () => {
      expect(codec.retain?.("+007")).toBe("7")
    })
  })

  describe("int64", () => {
    const codec = stringNumeric("int64")

    it("decodes beyond the safe integer range without loss", () => {
      expect(codec.decode("9223372036854775807")).toEqual({
        ok: true,
        value: 9223372036854775807n,
      })
    })

    it("reports overflow as out_of_range", () => {
      const result = codec.decode("9223372036854775808")

      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe("out_of_range")
    })

    it("encodes back to a string", () => {
      expect(codec.encode(-5n)).toBe("-5")
    })
  })

  describe("float64", () => {
    const codec = stringNumeric("float64")

    it("decodes exponent notation", () => {
      expect(codec.decode("1.5e3")).toEqual({ ok: true, value: 1500 })
    })

    it("rejects text that is not a numeral", () => {
      const result = codec.decode("12abc")

      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe("invalid_encoding")
    })

    it("reports values that overflow to infinity", () => {
      const result = codec.decode("1e999")

      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe("out_of_range")
    })
  })

  describe("decimal", () => {
    const codec = stringNumeric("decimal")

    it("keeps the numeral exactly as written", () => {
      expect(codec.decode("10.50")).toEqual({ ok: true, value: "10.50" })
      expect(codec.encode("10.50")).toBe("10.50")
    })

    it("is not lossy", () => {
      expect(codec.retain).toBeUndefined()
    })

    it("rejects malformed numerals", () => {
      const result = codec.decode("1.2.3")

      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe("invalid_encoding")
    })
  })
})
