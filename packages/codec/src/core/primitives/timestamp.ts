import type { Codec } from "../../ports/codec"
import { CodecError } from "../errors/codec-error"
import { err, ok } from "../result"
import { defineCodec } from "./define-codec"

/**
 * Wire forms a timestamp field can be declared to write.
 *
 * - `rfc3339`: `2024-01-02T03:04:05Z`, with `.sss` only when the instant has
 *   a non-zero millisecond part
 * - `rfc3339-millis`: always `2024-01-02T03:04:05.000Z`
 * - `epoch-seconds`: JSON number of seconds, fractional when needed
 * - `epoch-millis`: JSON integer of milliseconds
 */
export type TimestampWireForm = "rfc3339" | "rfc3339-millis" | "epoch-seconds" | "epoch-millis"

export type EpochUnit = "epoch-seconds" | "epoch-millis"

export type TimestampOptions = {
  encodeAs: TimestampWireForm

  /**
   * Numeric encoding accepted on decode in addition to ISO-8601 strings.
   * Defaults to `encodeAs` when that is an epoch form, otherwise none.
   */
  numeric?: EpochUnit
}

const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:[Zz]|([+-])(\d{2}):?(\d{2}))$/

const MAX_EPOCH_MS = 8.64e15

/** `0000-01-01T00:00:00.000Z` to `9999-12-31T23:59:59.999Z`, the four-digit-year range. */
const MIN_RFC3339_MS = -62_167_219_200_000
const MAX_RFC3339_MS = 253_402_300_799_999

function isRfc3339(form: TimestampWireForm): boolean {
  return form === "rfc3339" || form === "rfc3339-millis"
}

function fitsRfc3339(ms: number): boolean {
  return ms >= MIN_RFC3339_MS && ms <= MAX_RFC3339_MS
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
    return leap ? 29 : 28
  }

  return [4, 6, 9, 11].includes(month) ? 30 : 31
}

function parseIso(text: string): Date | CodecError {
  const match = ISO_8601.exec(text)
  if (!match) {
    return CodecError.invalidEncoding(`"${text}" is not an ISO-8601 date-time with offset`)
  }

  const [, y, mo, d, h, mi, s, fraction, sign, oh, om] = match
  const year = Number(y)
  const month = Number(mo)
  const day = Number(d)
  const hour = Number(h)
  const minute = Number(mi)
  const second = Number(s)
  const offsetHours = Number(oh ?? 0)
  const offsetMinutes = Number(om ?? 0)

  if (
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > daysInMonth(year, month) ||
    hour > 23 ||
    minute > 59 ||
    second > 59 ||
    offsetHours > 23 ||
    offsetMinutes > 59
  ) {
    return CodecError.invalidEncoding(`"${text}" has an out-of-range date or time component`)
  }

  // Digits beyond milliseconds are dropped.
  const millis = Number((fraction ?? "").padEnd(3, "0").slice(0, 3))
  const offset = (sign === "-" ? -1 : 1) * (offsetHours * 60 + offsetMinutes) * 60_000

  const date = new Date(0)
  date.setUTCFullYear(year, month - 1, day)
  date.setUTCHours(hour, minute, second, millis)

  return new Date(date.getTime() - offset)
}

function fromEpoch(value: number, unit: EpochUnit): Date | CodecError {
  if (unit === "epoch-millis" && !Number.isInteger(value)) {
    return CodecError.invalidEncoding(`${value} is not a whole number of milliseconds`)
  }

  const ms = unit === "epoch-millis" ? value : Math.round(value * 1000)
  if (Math.abs(ms) > MAX_EPOCH_MS) return CodecError.outOfRange(value, unit)

  return new Date(ms)
}

function render(date: Date, form: TimestampWireForm): string | number {
  const ms = date.getTime()
  if (Number.isNaN(ms)) throw CodecError.outOfRange("Invalid Date", "timestamp")
  if (isRfc3339(form) && !fitsRfc3339(ms)) {
    throw CodecError.outOfRange(date.toISOString(), "years 0000 to 9999")
  }

  switch (form) {
    case "rfc3339-millis":
      return date.toISOString()
    case "rfc3339":
      return ms % 1000 === 0 ? date.toISOString().replace(/\.000Z$/, "Z") : date.toISOString()
    case "epoch-seconds":
      return ms / 1000
    case "epoch-millis":
      return ms
  }
}

/**
 * Tolerant timestamp: decodes any ISO-8601 date-time with an explicit offset,
 * plus the declared epoch encoding, to a UTC `Date`. Encodes to the single
 * wire form the field declares, whatever form the value arrived in.
 */
export function timestamp(options: TimestampOptions): Codec<Date> {
  const { encodeAs } = options
  const numeric: EpochUnit | undefined =
    options.numeric ??
    (encodeAs === "epoch-seconds" || encodeAs === "epoch-millis" ? encodeAs : undefined)
  const expected = numeric ? `ISO-8601 string or ${numeric}` : "ISO-8601 string"

  return defineCodec<Date>({
    name: `timestamp:${encodeAs}`,
    lossy: true,
    decode: (wire) => {
      let parsed: Date | CodecError

      if (typeof wire === "string") {
        parsed = parseIso(wire)
      } else if (typeof wire === "number" && numeric) {
        parsed = fromEpoch(wire, numeric)
      } else {
        return err(CodecError.typeMismatch(expected, wire))
      }

      if (parsed instanceof CodecError) return err(parsed)

      // Only four-digit years can be written back in an rfc3339 form.
      if (isRfc3339(encodeAs) && !fitsRfc3339(parsed.getTime())) {
        return err(CodecError.outOfRange(wire, "years 0000 to 9999"))
      }

      return ok(parsed)
    },
    encode: (value) => render(value, encodeAs),
  })
}
