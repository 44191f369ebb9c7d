export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (field paths, expected kinds,
 * offending values) so callers never have to parse messages.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /**
   * Indicates whether this is an expected runtime failure (true) or a programmer
   * error / invariant violation (false).
   *
   * @remarks
   * - Operational errors (`true`): malformed payloads, missing required fields,
   *   values outside a declared range.
   * - Non-operational errors (`false`): a codec handed a value its own type
   *   rules out, unexpected exceptions from third-party code.
   *
   * @default true
   */
  readonly isOperational: boolean

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logging and reports.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
