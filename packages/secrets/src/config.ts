import { type ConfigSource, type IConfig, loadConfig } from "@cellar/config"
import { logLevelNames } from "@cellar/logger"
import { z } from "zod"

export const secretsConfigSchema = z.object({
  /** Name or ARN of the remote secret bundle. */
  SECRETS_SECRET_ID: z.string().min(1),
  SECRETS_BACKEND: z.enum(["secrets-manager", "ssm"]).default("secrets-manager"),
  SECRETS_KEY_POLICY: z.enum(["strip-marker", "legacy"]).default("strip-marker"),
  /** Unset leaves the region to the SDK's provider chain (AWS_REGION, shared config). */
  AWS_REGION: z.string().min(1).optional(),
  AWS_ENDPOINT: z.url().optional(),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type SecretsConfig = z.output<typeof secretsConfigSchema>

/**
 * Loads {@link SecretsConfig}, by default from `process.env`.
 *
 * @throws ConfigValidationError
 */
export function loadSecretsConfig(
  sources?: readonly ConfigSource[],
): Promise<IConfig<SecretsConfig>> {
  return loadConfig<SecretsConfig>({
    schema: secretsConfigSchema,
    ...(sources && { sources }),
  })
}
