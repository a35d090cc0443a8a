/**
 * Fields bound to a child logger for the lifetime of a component.
 */
export type LogContext = {
  service: string
  module: string

  /** Name of the active config sync, e.g. `"dir:/etc/kube-dns"`. */
  source: string

  namespace: string
  configMap: string
  dir: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
