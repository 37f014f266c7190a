export type LogContext = {
  service: string
  module: string
  env: string

  requestId: string

  /** Cache namespace of the manager emitting the entry. */
  namespace: string
  cacheKey: string

  durationMs: number
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
