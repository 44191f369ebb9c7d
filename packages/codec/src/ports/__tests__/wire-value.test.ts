import { isWireValue, lookup, wireKind } from "../wire-value"

describe("wireKind", () => {
  it.each([
    [undefined, "absent"],
    [null, "null"],
    ["", "string"],
    [0, "number"],
    [false, "boolean"],
    [[], "array"],
    [{}, "object"],
  ] as const)("classifies %j as %s", (value, kind) => {
    expect(wireKind(value)).toBe(kind)
  })
})

describe("lookup", () => {
  it("distinguishes an absent key from a null one", () => {
    const document = { present: null }

    expect(lookup(document, "present")).toBeNull()
    expect(lookup(document, "missing")).toBeUndefined()
  })

  it("ignores inherited properties", () => {
    expect(lookup({}, "constructor")).toBeUndefined()
    expect(lookup({}, "toString")).toBeUndefined()
  })
})

describe("isWireValue", () => {
  it("accepts parsed JSON", () => {
    expect(isWireValue(JSON.parse('{"a":[1,"b",null,{"c":true}]}'))).toBe(true)
  })

  it.each([
    ["undefined", undefined],
    ["a function", () => 1],
    ["a bigint", 1n],
    ["NaN", Number.NaN],
    ["a Date", new Date(0)],
    ["a Map", new Map()],
    ["a nested undefined", { a: [undefined] }],
  ])("rejects %s", (_label, value) => {
    expect(isWireValue(value)).toBe(false)
  })
})
