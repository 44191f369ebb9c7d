import { type CaseInsensitiveMultiMap, delimitedList } from "@wirecodec/codec"

const addresses = delimitedList({ dropEmpty: true })

/**
 * Client address chain from `X-Forwarded-For`, nearest client first. Every
 * header instance is split on commas; the results are concatenated in order.
 */
export function forwardedFor(headers: CaseInsensitiveMultiMap | null | undefined): string[] {
  return (headers?.get("x-forwarded-for") ?? []).flatMap((value) => {
    const decoded = addresses.decode(value)
    return decoded.ok ? [...decoded.value] : []
  })
}
