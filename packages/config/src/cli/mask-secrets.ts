import { DEFAULT_REDACTED_KEYS } from "@strata/logger"
import type { ReadonlyConfigValue } from "../ports/document"

export const MASK = "****"

function isArray(value: ReadonlyConfigValue): value is readonly ReadonlyConfigValue[] {
  return Array.isArray(value)
}

/**
 * Copy of `value` with every field named like a credential replaced by
 * {@link MASK}, at any depth. Key matching ignores case.
 */
export function maskSecrets(
  value: ReadonlyConfigValue,
  keys: readonly string[] = DEFAULT_REDACTED_KEYS,
): ReadonlyConfigValue {
  const masked = new Set(keys.map((key) => key.toLowerCase()))

  const walk = (current: ReadonlyConfigValue): ReadonlyConfigValue => {
    if (current === null || typeof current !== "object") return current
    if (isArray(current)) return current.map(walk)

    return Object.fromEntries(
      Object.entries(current).map(([key, child]) => [
        key,
        masked.has(key.toLowerCase()) && child !== null ? MASK : walk(child),
      ]),
    )
  }

  return walk(value)
}
