import { BaseError } from "@wirecodec/errors"
import { CodecError } from "../codec-error"
import { formatPath } from "../path"
import { RecordError } from "../record-error"

describe("formatPath", () => {
  it("renders identifiers with dots and indexes with brackets", () => {
    expect(formatPath(["Records", 0, "s3", "object", "size"])).toBe("Records[0].s3.object.size")
  })

  it("quotes keys that are not identifiers", () => {
    expect(formatPath(["responseElements", "x-amz-id-2"])).toBe(
      'responseElements["x-amz-id-2"]',
    )
  })

  it("renders the empty path as an empty string", () => {
    expect(formatPath([])).toBe("")
  })
})

describe("CodecError", () => {
  it("is a BaseError carrying its detail in context", () => {
    const error = CodecError.typeMismatch("string", 42)

    expect(error).toBeInstanceOf(BaseError)
    expect(error.code).toBe("type_mismatch")
    expect(error.context).toEqual({ expected: "string", actual: "number" })
  })

  it("prepends path segments without changing the kind", () => {
    const error = CodecError.outOfRange("2147483648", "int32").at("size").at("object")

    expect(error.path).toEqual(["object", "size"])
    expect(error.code).toBe("out_of_range")
    expect(error.message).toBe("object.size: 2147483648 is outside int32")
    expect(error.context).toEqual({ value: "2147483648", bound: "int32", path: "object.size" })
  })

  it("returns a new error from at()", () => {
    const error = CodecError.invalidEncoding("bad")

    expect(error.at("x")).not.toBe(error)
    expect(error.path).toEqual([])
  })
})

describe("RecordError", () => {
  const codecError = CodecError.typeMismatch("string", undefined).at("s3", "bucket", "name")
  const error = new RecordError("S3EventRecord", codecError)

  it("keeps the code of the wrapped codec error", () => {
    expect(error.code).toBe("type_mismatch")
    expect(error.cause).toBe(codecError)
    expect(error.codecError).toBe(codecError)
  })

  it("names the record, the wire key and the reason", () => {
    expect(error.message).toBe("S3EventRecord: s3.bucket.name: expected string, got absent")
    expect(error.recordType).toBe("S3EventRecord")
    expect(error.wireKey).toBe("s3")
    expect(error.fieldPath).toBe("s3.bucket.name")
  })

  it("merges the codec context under the record type", () => {
    expect(error.context).toEqual({
      recordType: "S3EventRecord",
      wireKey: "s3",
      expected: "string",
      actual: "absent",
      path: "s3.bucket.name",
    })
  })

  it("leaves wireKey out when the whole document was rejected", () => {
    const rootError = new RecordError("S3Event", CodecError.typeMismatch("object", null))

    expect(rootError.wireKey).toBeUndefined()
    expect(rootError.context).toEqual({ recordType: "S3Event", expected: "object", actual: "null" })
  })
})
