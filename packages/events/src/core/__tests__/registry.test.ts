import { S3Event } from "../families/s3"
import { eventFamilies, eventFamilyNames, familyDefinition, isEventFamily } from "../registry"

describe("eventFamilies", () => {
  it("lists every family name", () => {
    expect([...eventFamilyNames].sort()).toEqual(Object.keys(eventFamilies).sort())
  })

  it("recognizes family names", () => {
    expect(isEventFamily("apigw-request")).toBe(true)
    expect(isEventFamily("kinesis")).toBe(false)
    expect(isEventFamily("toString")).toBe(false)
  })

  it("returns the top-level definition", () => {
    expect(familyDefinition("s3")).toBe(S3Event)
    expect(familyDefinition("s3").name).toBe("S3Event")
  })
})
