/**
 * Fields a logger can be scoped to while configuration is assembled.
 */
export type LogContext = {
  service: string
  module: string

  /** Name of the configuration source, e.g. "argv" or "json:config.json" */
  source: string

  /** Subcommand chain being run, e.g. "remote add" */
  command: string
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
