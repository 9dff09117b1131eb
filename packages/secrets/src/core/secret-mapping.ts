/**
 * Flat key/value view of one remote payload. Values keep their JSON type;
 * only strings are retrievable as secrets.
 */
export type SecretMapping = ReadonlyMap<string, unknown>

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Parse a payload such as `{"db-pass":"s3cr3t"}`.
 *
 * Errors never quote the payload: it is secret material and ends up in logs.
 *
 * @throws SyntaxError when the payload is not JSON
 * @throws TypeError when the top-level value is not an object
 */
export function parseSecretMapping(payload: string): SecretMapping {
  const parsed = parseJson(payload)

  if (!isJsonObject(parsed)) {
    const shape = Array.isArray(parsed) ? "array" : parsed === null ? "null" : typeof parsed
    throw new TypeError(`Secret payload must be a JSON object, got ${shape}`)
  }

  return new Map(Object.entries(parsed))
}

function parseJson(payload: string): unknown {
  try {
    return JSON.parse(payload)
  } catch (err) {
    const position = err instanceof Error ? /at position (\d+)/.exec(err.message)?.[1] : undefined

    throw new SyntaxError(
      position === undefined
        ? "Secret payload is not valid JSON"
        : `Secret payload is not valid JSON (at position ${position})`,
    )
  }
}
