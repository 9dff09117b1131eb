import { secretFound } from "../../core/secret-result"
import type { SecretKey, SecretResult, SecretSource } from "../../ports/secret-source"

/**
 * Succeeds with `""` for every key. For exercising code paths that need a
 * secret lookup to succeed, without any backend.
 */
export class EmptySecretSource implements SecretSource {
  getByKey(_key: SecretKey): SecretResult {
    return secretFound("")
  }
}
