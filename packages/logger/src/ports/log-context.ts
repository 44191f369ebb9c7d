/**
 * Fields the codec tooling attaches to log entries.
 *
 * `family` and `sample` identify the payload under verification, `recordType`
 * and `path` locate a decode failure inside it.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  family: string
  sample: string

  recordType: string
  path: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
