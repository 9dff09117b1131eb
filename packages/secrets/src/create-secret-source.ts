import type { ConfigSource } from "@cellar/config"
import { createPinoLogger, type Logger } from "@cellar/logger"
import type { CachedRemoteSecretSource } from "./adapters/cached/cached-remote-secret-source"
import { CachedRemoteSecretSourceBuilder } from "./adapters/cached/cached-remote-secret-source-builder"
import { AwsSecretsManagerStore } from "./adapters/aws/aws-secrets-manager-store"
import { AwsSsmParameterStore } from "./adapters/aws/aws-ssm-parameter-store"
import {
  type AwsClientOptions,
  createSecretsManagerClient,
  createSsmClient,
} from "./adapters/aws/create-aws-clients"
import { loadSecretsConfig, type SecretsConfig } from "./config"
import type { RemoteSecretStore } from "./ports/remote-secret-store"

export type SecretSourceDeps = {
  /** @default a pino logger configured from LOG_LEVEL / LOG_PRETTY */
  logger?: Logger

  /** @default the AWS store selected by SECRETS_BACKEND */
  store?: RemoteSecretStore
}

/**
 * A store together with the SDK client it owns.
 */
export type SecretStoreHandle = {
  store: RemoteSecretStore

  /** Releases the client's sockets. The store must not be used afterwards. */
  destroy(): void
}

export function createSecretStore(config: SecretsConfig): SecretStoreHandle {
  const clientOptions: AwsClientOptions = {
    ...(config.AWS_REGION && { region: config.AWS_REGION }),
    ...(config.AWS_ENDPOINT && { endpoint: config.AWS_ENDPOINT }),
  }

  switch (config.SECRETS_BACKEND) {
    case "ssm": {
      const client = createSsmClient(clientOptions)
      return { store: new AwsSsmParameterStore({ client }), destroy: () => client.destroy() }
    }
    case "secrets-manager": {
      const client = createSecretsManagerClient(clientOptions)
      return { store: new AwsSecretsManagerStore({ client }), destroy: () => client.destroy() }
    }
  }
}

export function createSecretsLogger(config: SecretsConfig): Logger {
  return createPinoLogger(
    {},
    { level: config.LOG_LEVEL, prettify: config.LOG_PRETTY },
    { module: "secrets" },
  )
}

/**
 * Fetches the configured bundle and returns a ready source.
 *
 * A store created here is destroyed once the fetch settles; an injected
 * store is left to its owner.
 *
 * @throws SecretsManagerError when the fetch or parse fails
 */
export async function buildSecretSource(
  config: SecretsConfig,
  deps: SecretSourceDeps = {},
): Promise<CachedRemoteSecretSource> {
  const logger = deps.logger ?? createSecretsLogger(config)

  if (deps.store) return buildFrom(config, deps.store, logger)

  const handle = createSecretStore(config)

  try {
    return await buildFrom(config, handle.store, logger)
  } finally {
    handle.destroy()
  }
}

function buildFrom(
  config: SecretsConfig,
  store: RemoteSecretStore,
  logger: Logger,
): Promise<CachedRemoteSecretSource> {
  const builder = new CachedRemoteSecretSourceBuilder(
    { store, logger },
    {
      secretId: config.SECRETS_SECRET_ID,
      keyPolicy: config.SECRETS_KEY_POLICY,
    },
  )

  return builder.build()
}

/**
 * {@link loadSecretsConfig} followed by {@link buildSecretSource}.
 *
 * @throws ConfigValidationError | SecretsManagerError
 */
export async function loadSecretSource(
  sources?: readonly ConfigSource[],
  deps: SecretSourceDeps = {},
): Promise<CachedRemoteSecretSource> {
  const config = await loadSecretsConfig(sources)

  return buildSecretSource(config.value, deps)
}
