import { BaseError } from "../base-error"

describe("BaseError", () => {
  describe("construction", () => {
    it("creates error with required fields", () => {
      const err = new BaseError("field could not be decoded", { code: "type_mismatch" })

      expect(err.message).toBe("field could not be decoded")
      expect(err.code).toBe("type_mismatch")
    })

    it("sets name to constructor name", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.name).toBe("BaseError")
    })

    it("uses the subclass name for subclasses", () => {
      class PayloadError extends BaseError<"bad_payload"> {
        constructor() {
          super("bad payload", { code: "bad_payload" })
        }
      }

      expect(new PayloadError().name).toBe("PayloadError")
    })

    it("defaults context to an empty frozen object", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.context).toEqual({})
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("defaults isOperational to true", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.isOperational).toBe(true)
    })

    it("accepts optional context and freezes a copy", () => {
      const context = { expected: "string", actual: "number" }
      const err = new BaseError("test", { code: "type_mismatch", context })

      expect(err.context).toEqual({ expected: "string", actual: "number" })
      expect(err.context).not.toBe(context)
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("accepts optional cause", () => {
      const cause = new Error("root cause")
      const err = new BaseError("wrapped", { code: "test", cause })

      expect(err.cause).toBe(cause)
    })

    it("leaves cause undefined when none is given", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.cause).toBeUndefined()
      expect("cause" in err).toBe(false)
    })

    it("accepts optional isOperational", () => {
      const err = new BaseError("invariant", { code: "bug", isOperational: false })

      expect(err.isOperational).toBe(false)
    })

    it("has a stack trace", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.stack).toContain("BaseError")
    })
  })

  describe("type safety", () => {
    it("preserves generic code type", () => {
      type MyCode = "invalid_encoding" | "out_of_range"
      const err = new BaseError<MyCode>("bad", { code: "out_of_range" })

      const code: MyCode = err.code
      expect(code).toBe("out_of_range")
    })
  })

  describe("inheritance", () => {
    it("is instanceof Error and BaseError", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err).toBeInstanceOf(Error)
      expect(err).toBeInstanceOf(BaseError)
    })
  })

  describe("toJSON", () => {
    it("returns serialized error", () => {
      const err = new BaseError("test error", {
        code: "out_of_range",
        context: { value: "4294967296", bound: "int32" },
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "out_of_range",
        message: "test error",
        context: { value: "4294967296", bound: "int32" },
        isOperational: true,
      })
    })
  })
})
