export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels (higher = more severe).
 *
 * These match the numbers pino writes in the `level` field of each entry.
 */
export const LogLevels = {
  Trace: 10,
  Debug: 20,
  Info: 30,
  Warn: 40,
  Error: 50,
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

export function levelName(level: number): LogLevelName | undefined {
  switch (level) {
    case LogLevels.Trace:
      return "trace"
    case LogLevels.Debug:
      return "debug"
    case LogLevels.Info:
      return "info"
    case LogLevels.Warn:
      return "warn"
    case LogLevels.Error:
      return "error"
    case LogLevels.Fatal:
      return "fatal"
    default:
      return undefined
  }
}
