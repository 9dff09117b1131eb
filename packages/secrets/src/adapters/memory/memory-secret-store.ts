import type { RemoteSecretStore } from "../../ports/remote-secret-store"

/**
 * In-process {@link RemoteSecretStore} for tests and local development.
 *
 * Ids mapped to `null` model a secret that exists without a string payload;
 * unknown ids reject the way a missing remote secret does.
 */
export class MemorySecretStore implements RemoteSecretStore {
  readonly name = "memory"
  private readonly payloads: Map<string, string | null>
  private fetches = 0

  constructor(payloads: Readonly<Record<string, string | null>> = {}) {
    this.payloads = new Map(Object.entries(payloads))
  }

  /** Number of `fetchSecretString` calls so far. */
  get fetchCount(): number {
    return this.fetches
  }

  put(secretId: string, payload: string | null): void {
    this.payloads.set(secretId, payload)
  }

  putJson(secretId: string, secrets: Readonly<Record<string, unknown>>): void {
    this.put(secretId, JSON.stringify(secrets))
  }

  async fetchSecretString(secretId: string): Promise<string | null> {
    this.fetches++

    const payload = this.payloads.get(secretId)

    if (payload === undefined) {
      const err = new Error(`Secrets Manager can't find the specified secret: ${secretId}`)
      err.name = "ResourceNotFoundException"
      throw err
    }

    return payload
  }
}
