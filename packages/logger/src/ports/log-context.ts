/**
 * Well-known fields of a coder log entry.
 */
export type LogContext = {
  /** Coder description, e.g. `ListCoder(VarIntCoder)` */
  coder: string
  /** Encoding context, `nested` or `outer` */
  context: string
  operation: string
  step: string

  service: string
  module: string
  env: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
