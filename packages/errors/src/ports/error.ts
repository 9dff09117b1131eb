export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (identifiers, inputs).
 * Never put secret values here: context ends up in logs.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, machine-readable error code */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed */
  readonly isRetryable: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used by loggers and transports.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  isRetryable: boolean
  timestamp: string
  cause?: SerializedError
  stack?: string
}>
