import { BaseError } from "@wirecodec/errors"
import type { CodecError, CodecErrorCode, CodecErrorDetail } from "./codec-error"
import { formatPath, type PathSegment } from "./path"

/**
 * Failure to decode a whole record. Carries the same code as the codec error
 * it wraps, plus the record type and the wire key of the top-level field that
 * could not be read.
 */
export class RecordError extends BaseError<CodecErrorCode> {
  readonly recordType: string
  readonly wireKey: string | undefined
  readonly path: readonly PathSegment[]
  readonly codecError: CodecError

  constructor(recordType: string, codecError: CodecError) {
    const first = codecError.path[0]
    const wireKey = typeof first === "string" ? first : undefined

    super(`${recordType}: ${codecError.message}`, {
      code: codecError.code,
      cause: codecError,
      context: {
        recordType,
        ...(wireKey !== undefined && { wireKey }),
        ...codecError.context,
      },
    })

    this.recordType = recordType
    this.wireKey = wireKey
    this.path = codecError.path
    this.codecError = codecError
  }

  get detail(): CodecErrorDetail {
    return this.codecError.detail
  }

  get fieldPath(): string {
    return formatPath(this.path)
  }
}
