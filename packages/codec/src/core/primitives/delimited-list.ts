import type { Codec } from "../../ports/codec"
import { CodecError } from "../errors/codec-error"
import { err, ok } from "../result"
import { defineCodec } from "./define-codec"

export type DelimitedListOptions = {
  /** Default: `","` */
  delimiter?: string

  /** Separator written on encode. Default: `delimiter`. */
  joinWith?: string

  /** Trim whitespace around each element. Default: `true`. */
  trim?: boolean

  /** Drop empty elements (`"a,,b"` → `["a", "b"]`). Default: `false`. */
  dropEmpty?: boolean
}

/**
 * A single string holding delimiter-separated values, such as
 * `X-Forwarded-For: 203.0.113.7, 10.0.0.1`.
 *
 * Empty input decodes to an empty list, never to `[""]`.
 */
export function delimitedList(options: DelimitedListOptions = {}): Codec<readonly string[]> {
  const delimiter = options.delimiter ?? ","
  const joinWith = options.joinWith ?? delimiter
  const trim = options.trim ?? true
  const dropEmpty = options.dropEmpty ?? false

  if (delimiter === "") throw new TypeError("delimitedList delimiter must not be empty")

  return defineCodec<readonly string[]>({
    name: `delimited-list:${JSON.stringify(delimiter)}`,
    lossy: trim || dropEmpty || joinWith !== delimiter,
    decode: (wire) => {
      if (typeof wire !== "string") {
        return err(CodecError.typeMismatch("delimited string", wire))
      }

      if ((trim ? wire.trim() : wire) === "") return ok([])

      const parts = wire.split(delimiter).map((part) => (trim ? part.trim() : part))
      return ok(dropEmpty ? parts.filter((part) => part !== "") : parts)
    },
    encode: (values) => values.join(joinWith),
  })
}
