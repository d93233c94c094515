/**
 * Well-known fields a client attaches to its log entries.
 */
export type LogContext = {
  /** Logical name of the client instance */
  client: string
  module: string

  /** Server the command was written to */
  host: string
  /** Rendered command text */
  command: string
  /** Key prefix the client applies */
  prefix: string
  /** Connection mode of the client */
  useType: string

  service: string
  env: string
}

export type LogOutcome = {
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogEvent> &
  Record<string, unknown>

/** Fields added or overridden by `child()`. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
