import type { ConfigValue, ReadonlyConfigValue } from "../../ports/document"

const BOOLEAN_WORDS: Readonly<Record<string, boolean>> = {
  true: true,
  false: false,
}

/**
 * Coerces a string coming from the environment or the remote store to the
 * type of the value it replaces.
 *
 * Only numbers and booleans are coerced, and only when the string parses as
 * one. Anything else is returned unchanged.
 */
export function coerceLike(existing: ReadonlyConfigValue | undefined, incoming: string): ConfigValue {
  if (typeof existing === "number") {
    const trimmed = incoming.trim()
    const parsed = Number(trimmed)

    return trimmed !== "" && Number.isFinite(parsed) ? parsed : incoming
  }

  if (typeof existing === "boolean") {
    return BOOLEAN_WORDS[incoming.trim().toLowerCase()] ?? incoming
  }

  return incoming
}
