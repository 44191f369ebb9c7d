import { delimitedList } from "../delimited-list"

describe("delimitedList", () => {
  it('decodes "" to an empty list', () => {
    expect(delimitedList().decode("")).toEqual({ ok: true, value: [] })
  })

  it("keeps empty elements", () => {
    expect(delimitedList().decode("a,b,,c")).toEqual({ ok: true, value: ["a", "b", "", "c"] })
  })

  it("drops empty elements when declared", () => {
    expect(delimitedList({ dropEmpty: true }).decode("a,b,,c")).toEqual({
      ok: true,
      value: ["a", "b", "c"],
    })
  })

  it("trims elements by default", () => {
    expect(delimitedList().decode(" 203.0.113.7 , 10.0.0.1")).toEqual({
      ok: true,
      value: ["203.0.113.7", "10.0.0.1"],
    })
  })

  it("keeps whitespace when trimming is off", () => {
    expect(delimitedList({ trim: false }).decode("a, b")).toEqual({ ok: true, value: ["a", " b"] })
  })

  it("splits on a custom delimiter", () => {
    expect(delimitedList({ delimiter: ";" }).decode("x;y")).toEqual({
      ok: true,
      value: ["x", "y"],
    })
  })

  it("joins with joinWith on encode", () => {
    expect(delimitedList({ joinWith: ", " }).encode(["a", "b"])).toBe("a, b")
  })

  it("retains the re-joined form", () => {
    expect(delimitedList({ joinWith: ", " }).retain?.("a,b")).toBe("a, b")
  })

  it("is not lossy without trimming, dropping or re-joining", () => {
    expect(delimitedList({ trim: false }).retain).toBeUndefined()
  })

  it("rejects an empty delimiter", () => {
    expect(() => delimitedList({ delimiter: "" })).toThrow(TypeError)
  })

  it("rejects non-string input", () => {
    const result = delimitedList().decode(["a"])

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe("type_mismatch")
  })
})
