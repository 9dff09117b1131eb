import { guardLogger, type Logger } from "@cellar/logger"
import { SecretsManagerError } from "../../core/errors/secrets-manager-error"
import type { SecretKeyPolicy } from "../../core/normalize-secret-key"
import { parseSecretMapping, type SecretMapping } from "../../core/secret-mapping"
import type { RemoteSecretStore } from "../../ports/remote-secret-store"
import { CachedRemoteSecretSource } from "./cached-remote-secret-source"

export type CachedRemoteSecretSourceBuilderDeps = {
  store: RemoteSecretStore
  logger: Logger
}

export interface CachedRemoteSecretSourceBuilderOptions {
  /**
   * Name or ARN under which the remote store keeps the bundle.
   */
  secretId: string

  /** @default "strip-marker" */
  keyPolicy?: SecretKeyPolicy
}

/**
 * Fetches a secret bundle once and turns it into a {@link CachedRemoteSecretSource}.
 *
 * @example
 * ```ts
 * const source = await new CachedRemoteSecretSourceBuilder(
 *   { store: new AwsSecretsManagerStore({ client }), logger },
 *   { secretId: "billing/prod" },
 * ).build()
 *
 * const password = requireSecret(source, "!db-pass")
 * ```
 */
export class CachedRemoteSecretSourceBuilder {
  private readonly logger: Logger

  constructor(
    private readonly deps: CachedRemoteSecretSourceBuilderDeps,
    private readonly options: CachedRemoteSecretSourceBuilderOptions,
  ) {
    this.logger = guardLogger(deps.logger)
  }

  get secretId(): string {
    return this.options.secretId
  }

  /**
   * Every call fetches again and returns an independent instance.
   *
   * @throws SecretsManagerError `request_failure`, `aws_secret_was_not_found`
   * or `internal_error`
   */
  async build(): Promise<CachedRemoteSecretSource> {
    const payload = await this.fetch()
    const secrets = this.parse(payload)

    this.logger.debug("secrets loaded", {
      ...this.logContext(),
      keys: secrets.size,
    })

    return new CachedRemoteSecretSource({ logger: this.deps.logger }, secrets, {
      secretId: this.secretId,
      ...(this.options.keyPolicy && { keyPolicy: this.options.keyPolicy }),
    })
  }

  private async fetch(): Promise<string> {
    let payload: string | null

    try {
      payload = await this.deps.store.fetchSecretString(this.secretId)
    } catch (err) {
      this.logger.error("failure send request to secret manager", {
        ...this.logContext(),
        err,
      })

      throw new SecretsManagerError("request_failure", {
        context: this.logContext(),
        cause: err,
      })
    }

    if (!payload) {
      this.logger.error("secret was not found", this.logContext())

      throw new SecretsManagerError("aws_secret_was_not_found", {
        context: this.logContext(),
      })
    }

    return payload
  }

  private parse(payload: string): SecretMapping {
    try {
      return parseSecretMapping(payload)
    } catch (err) {
      this.logger.error("error mapping secrets", { ...this.logContext(), err })

      throw new SecretsManagerError("internal_error", {
        context: this.logContext(),
        cause: err,
      })
    }
  }

  private logContext() {
    return { secretId: this.secretId, store: this.deps.store.name }
  }
}
