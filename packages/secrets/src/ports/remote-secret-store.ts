/**
 * One remote secret service, reduced to "give me the payload stored under this id".
 */
export interface RemoteSecretStore {
  /** Short adapter name used in logs, e.g. "aws-secrets-manager". */
  readonly name: string

  /**
   * Resolves the payload string, or `null` when the service answered without one.
   * Rejects on any transport or service failure.
   */
  fetchSecretString(secretId: string): Promise<string | null>
}
