import type { Codec } from "../../ports/codec"
import { CodecError } from "../errors/codec-error"
import { err, ok } from "../result"
import { defineCodec } from "./define-codec"

const ALPHABET = /^[A-Za-z0-9+/]*$/

function decodeBase64(text: string): Uint8Array | CodecError {
  const padAt = text.indexOf("=")
  const body = padAt === -1 ? text : text.slice(0, padAt)
  const padding = padAt === -1 ? "" : text.slice(padAt)

  if (!ALPHABET.test(body)) {
    return CodecError.invalidEncoding("base64 text contains characters outside the alphabet")
  }

  if (!/^={0,2}$/.test(padding)) {
    return CodecError.invalidEncoding("base64 padding is malformed")
  }

  if (body.length % 4 === 1) {
    return CodecError.invalidEncoding(`base64 text has an impossible length of ${body.length}`)
  }

  // Missing or partial padding is accepted; producers differ on it.
  return Uint8Array.from(Buffer.from(body, "base64"))
}

const base64Codec = defineCodec<Uint8Array>({
  name: "base64",
  lossy: true,
  decode: (wire) => {
    if (typeof wire !== "string") return err(CodecError.typeMismatch("base64 string", wire))

    const bytes = decodeBase64(wire)
    return bytes instanceof CodecError ? err(bytes) : ok(bytes)
  },
  encode: (value) => Buffer.from(value).toString("base64"),
})

/**
 * Binary blob carried as base64 text. Encodes canonical padded base64 of the
 * exact bytes.
 */
export function base64(): Codec<Uint8Array> {
  return base64Codec
}
