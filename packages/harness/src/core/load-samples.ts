import fs from "node:fs/promises"
import path from "node:path"
import { isWireValue } from "@wirecodec/codec"
import { BaseError } from "@wirecodec/errors"
import { type EventFamily, isEventFamily } from "@wirecodec/events"
import type { RoundTripSample, SkippedSample } from "../ports/sample"

export class SampleError extends BaseError<"invalid_sample"> {
  constructor(file: string, reason: string, cause?: unknown) {
    super(`${file}: ${reason}`, { code: "invalid_sample", context: { file }, cause })
  }
}

export type LoadSamplesOptions = {
  /** Only load these families. All registered families when absent. */
  families?: readonly EventFamily[]
}

export type LoadedSamples = {
  samples: RoundTripSample[]
  skipped: SkippedSample[]
}

const SAMPLE_FILE = /^([^.]+)\.(.+)\.json$/

async function readSample(dir: string, file: string): Promise<unknown> {
  let content: string
  try {
    content = await fs.readFile(path.join(dir, file), "utf-8")
  } catch (err) {
    throw new SampleError(file, "could not be read", err)
  }

  try {
    return JSON.parse(content)
  } catch (err) {
    throw new SampleError(file, "is not valid JSON", err)
  }
}

/**
 * Reads every `<family>.<name>.json` file in `dir`, in file name order.
 *
 * Files whose family is not registered, or not selected, are reported as
 * skipped. A file that cannot be read or is not a JSON document throws a
 * `SampleError`.
 */
export async function loadSamples(
  dir: string,
  options: LoadSamplesOptions = {},
): Promise<LoadedSamples> {
  const selected = options.families ? new Set<string>(options.families) : undefined
  const files = (await fs.readdir(dir)).filter((file) => file.endsWith(".json")).sort()

  const samples: RoundTripSample[] = []
  const skipped: SkippedSample[] = []

  for (const file of files) {
    const [, family = "", name = ""] = SAMPLE_FILE.exec(file) ?? []

    if (!isEventFamily(family)) {
      skipped.push({ file, reason: "unknown_family" })
      continue
    }

    if (selected && !selected.has(family)) {
      skipped.push({ file, reason: "not_selected" })
      continue
    }

    const wire = await readSample(dir, file)
    if (!isWireValue(wire)) throw new SampleError(file, "is not a JSON document")

    samples.push({ name, family, file, wire })
  }

  return { samples, skipped }
}
