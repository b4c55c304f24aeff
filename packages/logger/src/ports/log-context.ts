/**
 * Fields a binding run attaches to its log entries.
 */
export type LogContext = {
  service: string
  module: string

  /** Prefix passed to the binder */
  prefix: string

  /** Declared field name */
  field: string

  /** Environment key that was looked up or resolved */
  key: string

  /** Where a value came from: "env", "fallback" or "default" */
  source: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context by child().
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
