import { BaseError } from "@cellar/errors"

export type ConfigIssue = Readonly<{
  path: string
  message: string
}>

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(
    message: string,
    readonly issues: readonly ConfigIssue[],
    sources: readonly string[],
  ) {
    super(message, {
      code: "config_invalid",
      context: { issues, sources },
    })
  }
}
