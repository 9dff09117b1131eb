/**
 * Fields a log entry may be scoped with.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** Remote identifier of the secret bundle being fetched. */
  secretId: string

  /** Name of the remote store adapter (e.g. "aws-secrets-manager"). */
  store: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Overlay applied by `child()` on top of the existing context.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
