import type { ConfigDocument } from "../../ports/document"
import { cloneValue, isConfigDocument } from "./config-value"

/**
 * Merges `override` onto `base` and returns a new document.
 *
 * Semantics:
 * - Plain mappings are merged recursively.
 * - Everything else (scalars, arrays, null) is replaced wholesale.
 *
 * Neither input is mutated.
 */
export function deepMerge(base: ConfigDocument, override: ConfigDocument): ConfigDocument {
  const result: ConfigDocument = {}

  for (const [key, value] of Object.entries(base)) {
    result[key] = cloneValue(value)
  }

  for (const [key, overrideVal] of Object.entries(override)) {
    const baseVal = result[key]

    if (isConfigDocument(baseVal) && isConfigDocument(overrideVal)) {
      result[key] = deepMerge(baseVal, overrideVal)
    } else {
      result[key] = cloneValue(overrideVal)
    }
  }

  return result
}
