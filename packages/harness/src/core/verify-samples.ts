import { checkRoundTrip, type RecordDefinition, type RoundTripReport } from "@wirecodec/codec"
import { type EventFamily, familyDefinition } from "@wirecodec/events"
import { type Logger, NullLogger } from "@wirecodec/logger"
import type { RoundTripSample } from "../ports/sample"

export type VerifyDeps = {
  /** Defaults to a logger that discards everything. */
  logger?: Logger

  /** Definition lookup. Defaults to the event family registry. */
  resolve?: (family: EventFamily) => RecordDefinition<object>
}

export type VerifyOptions = {
  /** Stop at the first failing sample. */
  failFast?: boolean
}

export type SampleReport = {
  readonly sample: string
  readonly family: EventFamily
  readonly report: RoundTripReport<object>
}

export type VerifyResult = {
  passed: number
  failed: number
  reports: SampleReport[]
}

function logFailure(logger: Logger, report: RoundTripReport<object>): void {
  if (report.ok) return

  switch (report.stage) {
    case "decode":
    case "redecode":
      logger.warn(`sample failed to ${report.stage}`, {
        err: report.error,
        recordType: report.error.recordType,
        path: report.error.fieldPath,
      })
      return
    case "wire":
      logger.warn("sample did not re-encode to its wire form", {
        differences: report.differences,
        path: report.differences[0]?.path,
      })
      return
    case "fixed_point":
      logger.warn("sample decoded differently after re-encoding")
      return
  }
}

/**
 * Runs the round-trip check over every sample and logs each outcome.
 */
export function verifySamples(
  deps: VerifyDeps,
  samples: readonly RoundTripSample[],
  options: VerifyOptions = {},
): VerifyResult {
  const baseLogger = deps.logger ?? new NullLogger()
  const resolve = deps.resolve ?? familyDefinition
  const result: VerifyResult = { passed: 0, failed: 0, reports: [] }

  for (const sample of samples) {
    const logger = baseLogger.child({ family: sample.family, sample: sample.name })
    const report = checkRoundTrip(resolve(sample.family), sample.wire)

    result.reports.push({ sample: sample.name, family: sample.family, report })

    if (report.ok) {
      result.passed++
      logger.debug("sample verified")
      continue
    }

    result.failed++
    logFailure(logger, report)

    if (options.failFast) break
  }

  baseLogger.info("verification finished", {
    total: samples.length,
    checked: result.reports.length,
    passed: result.passed,
    failed: result.failed,
  })

  return result
}
