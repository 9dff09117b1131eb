import type { SecretKey } from "../ports/secret-source"

export const SECRET_KEY_MARKER = "!"

/**
 * How a key without the leading marker is treated.
 *
 * - `"strip-marker"`: the key is used as is.
 * - `"legacy"`: the key becomes `""`, which matches nothing in practice. Only for
 *   callers that depend on marker-less keys failing.
 */
export type SecretKeyPolicy = "strip-marker" | "legacy"

export const DEFAULT_SECRET_KEY_POLICY: SecretKeyPolicy = "strip-marker"

export function normalizeSecretKey(
  key: SecretKey,
  policy: SecretKeyPolicy = DEFAULT_SECRET_KEY_POLICY,
): string {
  if (key.startsWith(SECRET_KEY_MARKER)) return key.slice(SECRET_KEY_MARKER.length)

  return policy === "legacy" ? "" : key
}
