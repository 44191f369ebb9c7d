import { BaseError } from "@wirecodec/errors"
import { type WireInput, type WireKind, wireKind } from "../../ports/wire-value"
import { formatPath, type PathSegment } from "./path"

export type CodecErrorCode = "type_mismatch" | "invalid_encoding" | "out_of_range"

export type CodecErrorDetail =
  | { readonly code: "type_mismatch"; readonly expected: string; readonly actual: WireKind }
  | { readonly code: "invalid_encoding"; readonly reason: string }
  | { readonly code: "out_of_range"; readonly value: string; readonly bound: string }

function describe(detail: CodecErrorDetail): string {
  switch (detail.code) {
    case "type_mismatch":
      return `expected ${detail.expected}, got ${detail.actual}`
    case "invalid_encoding":
      return detail.reason
    case "out_of_range":
      return `${detail.value} is outside ${detail.bound}`
  }
}

function contextOf(detail: CodecErrorDetail, path: readonly PathSegment[]) {
  const { code: _code, ...fields } = detail
  return path.length > 0 ? { ...fields, path: formatPath(path) } : fields
}

/**
 * A codec-level decode failure.
 *
 * `path` is relative to wherever the failing codec was applied. Each layer on
 * the way up (array index, map key, record field) prepends its own segment
 * with `at()`; the kind never changes.
 */
export class CodecError extends BaseError<CodecErrorCode> {
  readonly detail: CodecErrorDetail
  readonly path: readonly PathSegment[]

  constructor(detail: CodecErrorDetail, path: readonly PathSegment[]) {
    const where = formatPath(path)
    super(where === "" ? describe(detail) : `${where}: ${describe(detail)}`, {
      code: detail.code,
      context: contextOf(detail, path),
    })

    this.detail = detail
    this.path = Object.freeze([...path])
  }

  static typeMismatch(expected: string, actual: WireInput): CodecError {
    return new CodecError({ code: "type_mismatch", expected, actual: wireKind(actual) }, [])
  }

  static invalidEncoding(reason: string): CodecError {
    return new CodecError({ code: "invalid_encoding", reason }, [])
  }

  static outOfRange(value: string | number | bigint, bound: string): CodecError {
    return new CodecError({ code: "out_of_range", value: String(value), bound }, [])
  }

  at(...segments: PathSegment[]): CodecError {
    return new CodecError(this.detail, [...segments, ...this.path])
  }
}
