export {
  AwsSecretsManagerStore,
  type AwsSecretsManagerStoreDeps,
  type AwsSecretsManagerStoreOptions,
  type SecretsManagerReader,
} from "./adapters/aws/aws-secrets-manager-store"
export {
  AwsSsmParameterStore,
  type AwsSsmParameterStoreDeps,
  type SsmParameterReader,
} from "./adapters/aws/aws-ssm-parameter-store"
export {
  type AwsClientOptions,
  createSecretsManagerClient,
  createSsmClient,
} from "./adapters/aws/create-aws-clients"
export {
  CachedRemoteSecretSource,
  type CachedRemoteSecretSourceDeps,
  type CachedRemoteSecretSourceOptions,
} from "./adapters/cached/cached-remote-secret-source"
export {
  CachedRemoteSecretSourceBuilder,
  type CachedRemoteSecretSourceBuilderDeps,
  type CachedRemoteSecretSourceBuilderOptions,
} from "./adapters/cached/cached-remote-secret-source-builder"
export { EmptySecretSource } from "./adapters/empty/empty-secret-source"
export { MemorySecretStore } from "./adapters/memory/memory-secret-store"
export { loadSecretsConfig, type SecretsConfig, secretsConfigSchema } from "./config"
export {
  isSecretsManagerError,
  SecretsManagerError,
  type SecretsManagerErrorCode,
  SecretsManagerErrorCodes,
} from "./core/errors/secrets-manager-error"
export {
  DEFAULT_SECRET_KEY_POLICY,
  normalizeSecretKey,
  SECRET_KEY_MARKER,
  type SecretKeyPolicy,
} from "./core/normalize-secret-key"
export { parseSecretMapping, type SecretMapping } from "./core/secret-mapping"
export {
  requireSecret,
  secretFailed,
  secretFound,
  unwrapSecret,
} from "./core/secret-result"
export {
  buildSecretSource,
  createSecretStore,
  createSecretsLogger,
  loadSecretSource,
  type SecretSourceDeps,
  type SecretStoreHandle,
} from "./create-secret-source"
export type { RemoteSecretStore } from "./ports/remote-secret-store"
export type {
  SecretFailed,
  SecretFound,
  SecretKey,
  SecretResult,
  SecretSource,
} from "./ports/secret-source"
