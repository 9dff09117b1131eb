/**
 * Loads raw configuration values. No validation, coercion or merging happens here;
 * `loadConfig` applies sources in order (later wins) and validates the result.
 */
export interface ConfigSource {
  /**
   * Provenance label, e.g. "env" or "dotenv:.env.local".
   */
  readonly name: string

  /**
   * Flat key/value pairs. An `undefined` value means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
