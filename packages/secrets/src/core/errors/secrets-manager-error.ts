import { BaseError, type ErrorContext } from "@cellar/errors"

export const SecretsManagerErrorCodes = {
  /** A local step failed, e.g. the payload is not a flat JSON object. */
  InternalError: "internal_error",
  /** The call to the remote store failed. */
  RequestFailure: "request_failure",
  /** The key is absent from the cached mapping or maps to a non-string. */
  SecretNotFound: "secret_not_found",
  /** The remote store answered without a payload string. */
  AwsSecretWasNotFound: "aws_secret_was_not_found",
} as const

export type SecretsManagerErrorCode =
  (typeof SecretsManagerErrorCodes)[keyof typeof SecretsManagerErrorCodes]

const MESSAGES: Record<SecretsManagerErrorCode, string> = {
  internal_error: "internal error",
  request_failure: "failure to send request",
  secret_not_found: "secret not found",
  aws_secret_was_not_found: "aws secret was not found",
}

export type SecretsManagerErrorOptions = {
  context?: ErrorContext
  cause?: unknown
}

/**
 * The only error type surfaced by secret sources and the builder.
 * Two errors are the same kind when their `code`s are equal. None is retryable.
 */
export class SecretsManagerError extends BaseError<SecretsManagerErrorCode> {
  constructor(code: SecretsManagerErrorCode, options: SecretsManagerErrorOptions = {}) {
    super(MESSAGES[code], { ...options, code, isRetryable: false })
  }

  is(code: SecretsManagerErrorCode): boolean {
    return this.code === code
  }
}

export function isSecretsManagerError(
  err: unknown,
  code?: SecretsManagerErrorCode,
): err is SecretsManagerError {
  return err instanceof SecretsManagerError && (code === undefined || err.code === code)
}
