import type { SecretsManagerError } from "../core/errors/secrets-manager-error"

/**
 * Identifier of a secret inside a bundle. A leading `!` marks a key reference
 * and is stripped before lookup.
 */
export type SecretKey = string

export type SecretFound = {
  readonly kind: "found"
  readonly value: string
}

export type SecretFailed = {
  readonly kind: "failed"
  readonly error: SecretsManagerError
}

/**
 * Outcome of a lookup. A failure always carries one of the
 * {@link SecretsManagerError} codes; there are no partial results.
 */
export type SecretResult = SecretFound | SecretFailed

/**
 * Read-only access to secrets by key, independent of where they are stored.
 *
 * @remarks
 * Lookups are synchronous and side-effect free on success, so one instance can
 * be shared by any number of concurrent callers.
 */
export interface SecretSource {
  getByKey(key: SecretKey): SecretResult
}
