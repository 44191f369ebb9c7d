import { optionalOf } from "../optional"
import { json, string } from "../string"
import { timestamp } from "../timestamp"

describe("optionalOf", () => {
  describe("without a default", () => {
    const codec = optionalOf(string())

    it("decodes absent to undefined", () => {
      expect(codec.decode(undefined)).toEqual({ ok: true, value: undefined })
    })

    it("decodes null to null", () => {
      expect(codec.decode(null)).toEqual({ ok: true, value: null })
    })

    it("propagates inner failures", () => {
      const result = codec.decode(5)

      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.message).toBe("expected string, got number")
    })

    it("omits undefined and keeps null on encode", () => {
      expect(codec.encode(undefined)).toBeUndefined()
      expect(codec.encode(null)).toBeNull()
      expect(codec.encode("v")).toBe("v")
    })
  })

  describe("with a default", () => {
    const codec = optionalOf(string(), { default: "fallback" })

    it("decodes absent to the default", () => {
      expect(codec.decode(undefined)).toEqual({ ok: true, value: "fallback" })
    })

    it("decodes an explicit null to null", () => {
      expect(codec.decode(null)).toEqual({ ok: true, value: null })
    })

    it("does not call the inner codec for absent", () => {
      const inner = { ...string(), decode: vi.fn(string().decode) }
      optionalOf(inner, { default: "x" }).decode(undefined)

      expect(inner.decode).not.toHaveBeenCalled()
    })
  })

  describe("with nullIsDefault", () => {
    const codec = optionalOf(string(), { default: "fallback", nullIsDefault: true })

    it("decodes null to the default", () => {
      expect(codec.decode(null)).toEqual({ ok: true, value: "fallback" })
    })

    it("retains null as the encoded default", () => {
      expect(codec.retain?.(null)).toBe("fallback")
    })
  })

  it("rejects a null default", () => {
    expect(() => optionalOf(json(), { default: null })).toThrow(TypeError)
  })

  it("forwards the inner retain for present values", () => {
    const codec = optionalOf(timestamp({ encodeAs: "rfc3339" }))

    expect(codec.retain?.("2024-01-02T03:04:05.000Z")).toBe("2024-01-02T03:04:05Z")
    expect(codec.retain?.(null)).toBeNull()
  })
})
