/**
 * Fields a configuration process attaches to its log entries.
 *
 * All fields are optional at the call site; adapters merge them with the
 * bindings of the logger they were called on.
 */
export type LogContext = {
  service: string
  module: string

  /** Deployment stage the resolver is running for. */
  env: string

  /** Application segment of remote parameter paths. */
  app: string

  /** Name of the configuration source that produced an entry. */
  source: string

  /** Configuration section (database or cloud service) being resolved. */
  section: string

  durationMs: number
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
