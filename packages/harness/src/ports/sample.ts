import type { WireValue } from "@wirecodec/codec"
import type { EventFamily } from "@wirecodec/events"

/**
 * A captured wire payload and the family it decodes to, read from
 * `<family>.<name>.json`.
 */
export type RoundTripSample = {
  readonly name: string
  readonly family: EventFamily
  readonly file: string
  readonly wire: WireValue
}

export type SkipReason = "unknown_family" | "not_selected"

export type SkippedSample = {
  readonly file: string
  readonly reason: SkipReason
}
