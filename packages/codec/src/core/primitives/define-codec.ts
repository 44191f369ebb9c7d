import type { Codec, CodecResult } from "../../ports/codec"
import type { WireInput } from "../../ports/wire-value"

export type CodecDefinition<T> = {
  name: string
  decode(wire: WireInput): CodecResult<T>
  encode(value: T): WireInput

  /**
   * Set when `encode(decode(wire))` may legitimately differ from `wire`
   * (normalized offsets, canonical padding, trimmed whitespace).
   */
  lossy?: boolean
}

export function defineCodec<T>(definition: CodecDefinition<T>): Codec<T> {
  const { name, decode, encode } = definition

  if (!definition.lossy) {
    return Object.freeze({ name, decode, encode })
  }

  return Object.freeze({
    name,
    decode,
    encode,
    retain(wire) {
      const decoded = decode(wire)
      if (!decoded.ok) return wire

      return encode(decoded.value) ?? wire
    },
  } satisfies Codec<T>)
}
