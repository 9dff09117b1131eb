import {
  GetSecretValueCommand,
  type GetSecretValueCommandOutput,
} from "@aws-sdk/client-secrets-manager"
import type { RemoteSecretStore } from "../../ports/remote-secret-store"

/**
 * The part of `SecretsManagerClient` this store uses. A real client satisfies it.
 */
export type SecretsManagerReader = {
  send(command: GetSecretValueCommand): Promise<GetSecretValueCommandOutput>
}

export type AwsSecretsManagerStoreDeps = {
  client: SecretsManagerReader
}

export interface AwsSecretsManagerStoreOptions {
  /**
   * Staging label to read, e.g. "AWSPENDING".
   * @default the service default ("AWSCURRENT")
   */
  versionStage?: string
}

/**
 * Reads the `SecretString` of an AWS Secrets Manager secret.
 * Binary-only secrets resolve to `null`.
 */
export class AwsSecretsManagerStore implements RemoteSecretStore {
  readonly name = "aws-secrets-manager"
  private readonly versionStage?: string

  constructor(
    private readonly deps: AwsSecretsManagerStoreDeps,
    options: AwsSecretsManagerStoreOptions = {},
  ) {
    if (options.versionStage) this.versionStage = options.versionStage
  }

  async fetchSecretString(secretId: string): Promise<string | null> {
    try {
      const response = await this.deps.client.send(
        new GetSecretValueCommand({
          SecretId: secretId,
          ...(this.versionStage && { VersionStage: this.versionStage }),
        }),
      )

      return response.SecretString ?? null
    } catch (error: unknown) {
      throw new Error(`Failed to get secret: ${secretId}`, { cause: error })
    }
  }
}
