import type { ResolvedSecret } from "../../ports/document"
import { isPlainObject, isReservedKey } from "../document/config-value"
import { ConfigValidationError } from "../errors/config-error"

/**
 * Parses a secret stored as a JSON object of scalars. Numbers and booleans
 * are rendered as strings.
 *
 * @throws ConfigValidationError when the payload is not such an object.
 */
export function parseSecretPayload(secretName: string, payload: string): ResolvedSecret {
  let parsed: unknown

  try {
    parsed = JSON.parse(payload)
  } catch (err) {
    throw new ConfigValidationError(`Secret ${secretName} is not valid JSON`, { secretName }, err)
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigValidationError(`Secret ${secretName} must be a JSON object`, { secretName })
  }

  const out: Record<string, string> = {}

  for (const [key, value] of Object.entries(parsed)) {
    if (isReservedKey(key)) continue

    if (typeof value === "string") {
      out[key] = value
    } else if (typeof value === "number" || typeof value === "boolean") {
      out[key] = String(value)
    } else {
      throw new ConfigValidationError(
        `Secret ${secretName} field '${key}' must be a string, number or boolean`,
        { secretName, field: key },
      )
    }
  }

  return Object.freeze(out)
}
