import { guardLogger, type Logger } from "@cellar/logger"
import { SecretsManagerError } from "../../core/errors/secrets-manager-error"
import {
  DEFAULT_SECRET_KEY_POLICY,
  normalizeSecretKey,
  type SecretKeyPolicy,
} from "../../core/normalize-secret-key"
import type { SecretMapping } from "../../core/secret-mapping"
import { secretFailed, secretFound } from "../../core/secret-result"
import type { SecretKey, SecretResult, SecretSource } from "../../ports/secret-source"

export type CachedRemoteSecretSourceDeps = {
  logger: Logger
}

export interface CachedRemoteSecretSourceOptions {
  /** Remote identifier the mapping was fetched from; only used in logs and errors. */
  secretId?: string

  /** @default "strip-marker" */
  keyPolicy?: SecretKeyPolicy
}

/**
 * Answers lookups from one snapshot of a remote secret bundle.
 *
 * The snapshot is never refreshed; build a new instance to pick up changes.
 * Usually obtained from {@link CachedRemoteSecretSourceBuilder}.
 */
export class CachedRemoteSecretSource implements SecretSource {
  private readonly logger: Logger
  private readonly secrets: SecretMapping
  private readonly keyPolicy: SecretKeyPolicy
  private readonly secretId: string | undefined

  constructor(
    deps: CachedRemoteSecretSourceDeps,
    secrets: SecretMapping,
    options: CachedRemoteSecretSourceOptions = {},
  ) {
    this.logger = guardLogger(deps.logger)
    this.secrets = new Map(secrets)
    this.keyPolicy = options.keyPolicy ?? DEFAULT_SECRET_KEY_POLICY
    this.secretId = options.secretId
  }

  /** Number of entries in the snapshot, string-valued or not. */
  get size(): number {
    return this.secrets.size
  }

  getByKey(key: SecretKey): SecretResult {
    const value = this.lookup(key)

    if (value === null) {
      this.logger.error(`secret ${key} was not found`, {
        key,
        ...(this.secretId && { secretId: this.secretId }),
      })

      return secretFailed(
        new SecretsManagerError("secret_not_found", {
          context: { key, ...(this.secretId && { secretId: this.secretId }) },
        }),
      )
    }

    return secretFound(value)
  }

  /**
   * Whether `key` resolves to a string value. Does not log.
   */
  has(key: SecretKey): boolean {
    return this.lookup(key) !== null
  }

  private lookup(key: SecretKey): string | null {
    const value = this.secrets.get(normalizeSecretKey(key, this.keyPolicy))

    return typeof value === "string" ? value : null
  }
}
