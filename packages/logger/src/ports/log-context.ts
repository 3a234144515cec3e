export type LogContext = {
  service: string
  module: string
  env: string

  /** Binding key being resolved, e.g. "Retry:Timeout" */
  configKey: string
  /** Readable target type, e.g. "int32[]" */
  targetType: string
  /** Configuration source name, e.g. "json:appsettings.json" */
  source: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
