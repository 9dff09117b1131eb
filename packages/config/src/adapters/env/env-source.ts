import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /**
   * Only keys starting with this prefix are read, with the prefix removed.
   * E.g. prefix "APP_" maps APP_AWS_REGION to AWS_REGION.
   */
  prefix?: string

  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Readonly<Record<string, string | undefined>>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (!key.startsWith(this.prefix)) continue

      values[key.slice(this.prefix.length)] = value
    }

    return values
  }
}
