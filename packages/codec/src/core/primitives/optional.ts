import type { Codec, CodecResult } from "../../ports/codec"
import type { WireInput, WireValue } from "../../ports/wire-value"
import { ok } from "../result"

export type OptionalOptions<T> = {
  /** Value substituted when the key is absent. */
  default: T

  /** Also substitute the default for an explicit `null`. */
  nullIsDefault?: boolean
}

/**
 * What `inner.encode(inner.decode(wire))` produces, or `wire` itself when the
 * codec reproduces its input.
 */
export function retainOf<T>(codec: Codec<T>, wire: WireValue): WireValue {
  return codec.retain ? codec.retain(wire) : wire
}

function encodeInner<T>(inner: Codec<T>, value: T | null | undefined): WireInput {
  if (value === undefined) return undefined
  if (value === null) return null

  return inner.encode(value)
}

/**
 * Wraps `inner` with an absent/null policy.
 *
 * - absent: the declared default, or `undefined`; `inner` is not called
 * - `null`: `null`, or the default when `nullIsDefault` is set
 * - anything else: delegated, inner failures propagate unchanged
 *
 * Encode mirrors it: `undefined` omits the key, `null` writes `null`.
 *
 * A `null` default is rejected: absent and `null` must decode apart.
 */
export function optionalOf<T>(
  inner: Codec<T>,
  options: OptionalOptions<T> & { nullIsDefault: true },
): Codec<T>
export function optionalOf<T>(inner: Codec<T>, options: OptionalOptions<T>): Codec<T | null>
export function optionalOf<T>(inner: Codec<T>): Codec<T | null | undefined>
export function optionalOf<T>(
  inner: Codec<T>,
  options?: OptionalOptions<T>,
): Codec<T | null | undefined> {
  if (options?.default === null) {
    throw new TypeError(`optionalOf(${inner.name}) default must not be null`)
  }

  const hasDefault = options !== undefined
  const nullIsDefault = options?.nullIsDefault ?? false

  const decode = (wire: WireInput): CodecResult<T | null | undefined> => {
    if (wire === undefined) return ok(options?.default)
    if (wire === null) return ok(nullIsDefault ? options?.default : null)

    return inner.decode(wire)
  }

  const encode = (value: T | null | undefined): WireInput => encodeInner(inner, value)

  const retain = (wire: WireValue): WireValue => {
    if (wire === null) {
      if (!nullIsDefault || options === undefined) return null
      return inner.encode(options.default) ?? null
    }

    return retainOf(inner, wire)
  }

  return Object.freeze({
    name: hasDefault ? `optional:${inner.name}=default` : `optional:${inner.name}`,
    decode,
    encode,
    ...((inner.retain || nullIsDefault) && { retain }),
  })
}
