import { base64, type CodecResult, err, ok } from "@wirecodec/codec"

export type RequestBody =
  | { readonly kind: "empty" }
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "binary"; readonly bytes: Uint8Array }

/**
 * The body fields shared by gateway and load-balancer envelopes.
 */
export type BodyCarrier = {
  readonly body?: string | null
  readonly isBase64Encoded?: boolean | null
}

const bodyBytes = base64()

/**
 * Reads the body of a request or response envelope, decoding it from base64
 * when the envelope says so. A flagged body that is not valid base64 fails
 * with the error path `body`.
 */
export function requestBody(carrier: BodyCarrier): CodecResult<RequestBody> {
  const { body } = carrier
  if (body === undefined || body === null) return ok({ kind: "empty" })

  if (!carrier.isBase64Encoded) return ok({ kind: "text", text: body })

  const decoded = bodyBytes.decode(body)
  return decoded.ok ? ok({ kind: "binary", bytes: decoded.value }) : err(decoded.error.at("body"))
}
