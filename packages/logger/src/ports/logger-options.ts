import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior. Adapters must honor them but
 * are free to choose how.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Any log entries below this level are ignored.
   */
  level: LogLevelName

  /**
   * Whether to pretty-print log output for human readability.
   *
   * @remarks
   * Intended for running the sample verifier locally. Leave disabled in CI
   * where JSON lines are collected.
   */
  prettify?: boolean
}
