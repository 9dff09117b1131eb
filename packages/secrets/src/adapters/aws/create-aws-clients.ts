import { SecretsManagerClient } from "@aws-sdk/client-secrets-manager"
import { SSMClient } from "@aws-sdk/client-ssm"

export type AwsClientOptions = {
  /** @default resolved by the SDK's provider chain */
  region?: string

  /** Custom endpoint, e.g. a LocalStack URL. */
  endpoint?: string
}

/**
 * Credentials, and the region when not given, come from the SDK's default
 * provider chain.
 */
export function createSecretsManagerClient(options: AwsClientOptions = {}): SecretsManagerClient {
  return new SecretsManagerClient({
    ...(options.region && { region: options.region }),
    ...(options.endpoint && { endpoint: options.endpoint }),
  })
}

export function createSsmClient(options: AwsClientOptions = {}): SSMClient {
  return new SSMClient({
    ...(options.region && { region: options.region }),
    ...(options.endpoint && { endpoint: options.endpoint }),
  })
}
