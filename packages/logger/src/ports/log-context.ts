export type LogContext = {
  service: string
  module: string

  /** Diagnostic name of the shape being encoded or decoded */
  shape: string
  operation: "encode" | "decode"
}

export type LogOutcome = {
  byteLength: number
  offset: number
  code: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
