import type {
  SecretFailed,
  SecretFound,
  SecretKey,
  SecretResult,
  SecretSource,
} from "../ports/secret-source"
import type { SecretsManagerError } from "./errors/secrets-manager-error"

export function secretFound(value: string): SecretFound {
  return { kind: "found", value }
}

export function secretFailed(error: SecretsManagerError): SecretFailed {
  return { kind: "failed", error }
}

/**
 * Returns the value of a successful lookup, or throws the carried error.
 */
export function unwrapSecret(result: SecretResult): string {
  if (result.kind === "failed") throw result.error

  return result.value
}

/**
 * Lookup for secrets the caller cannot run without, e.g. during startup.
 *
 * @throws SecretsManagerError
 */
export function requireSecret(source: SecretSource, key: SecretKey): string {
  return unwrapSecret(source.getByKey(key))
}
