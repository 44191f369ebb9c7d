import type { AppError, ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"

function systemErrorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined
}

/**
 * Normalizes a thrown value into an AppError.
 *
 * - AppErrors built on BaseError pass through unchanged.
 * - System errors from file access (`ENOENT`, `EACCES`) are operational and
 *   keep their code as `context.systemCode`.
 * - Anything else is wrapped as non-operational.
 *
 * @param fallbackCode - Code for values that are not already AppErrors. Default: "unknown"
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): AppError {
  if (err instanceof BaseError) return err

  if (err instanceof Error) {
    const systemCode = systemErrorCode(err)

    return new BaseError(err.message, {
      code: fallbackCode,
      cause: err,
      ...(systemCode !== undefined && { context: { systemCode } }),
      isOperational: systemCode !== undefined,
    })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code: fallbackCode,
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
  })
}
