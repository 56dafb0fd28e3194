export type LogContext = {
  service: string
  module: string
  env: string

  /** Name of the state space a collection is bound to. */
  space: string
  /** Operation being performed, e.g. "load" or "store". */
  operation: string
  /** Archive path, or a short description of the stream being used. */
  archive: string
}

export type LogOutcome = {
  recordCount: number
  bytesWritten: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
