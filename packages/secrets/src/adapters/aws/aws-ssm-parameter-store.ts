import { GetParameterCommand, type GetParameterCommandOutput } from "@aws-sdk/client-ssm"
import type { RemoteSecretStore } from "../../ports/remote-secret-store"

/**
 * The part of `SSMClient` this store uses. A real client satisfies it.
 */
export type SsmParameterReader = {
  send(command: GetParameterCommand): Promise<GetParameterCommandOutput>
}

export type AwsSsmParameterStoreDeps = {
  client: SsmParameterReader
}

/**
 * Reads one (usually SecureString) SSM parameter holding a JSON bundle.
 * The secret id is the parameter name, e.g. "/billing/prod/secrets".
 */
export class AwsSsmParameterStore implements RemoteSecretStore {
  readonly name = "aws-ssm"

  constructor(private readonly deps: AwsSsmParameterStoreDeps) {}

  async fetchSecretString(secretId: string): Promise<string | null> {
    try {
      const response = await this.deps.client.send(
        new GetParameterCommand({
          Name: secretId,
          WithDecryption: true,
        }),
      )

      return response.Parameter?.Value ?? null
    } catch (error: unknown) {
      throw new Error(`Failed to get parameter: ${secretId}`, { cause: error })
    }
  }
}
