/**
 * Validated, read-only configuration.
 *
 * @typeParam T - Output type of the zod schema it was loaded with.
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that supplied `key`, or "default" when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct provenance labels, in first-use order. */
  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not know. */
  unknownKeys(): string[]
}
