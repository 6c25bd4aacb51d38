import type {
  ConfigDocument,
  ConfigValue,
  ReadonlyConfigDocument,
  ReadonlyConfigValue,
} from "../../ports/document"
import { isConfigDocument, isReservedKey } from "./config-value"

export type ConfigPath = readonly string[]

export function parsePath(dotted: string): ConfigPath {
  return dotted.split(".").filter((segment) => segment.length > 0)
}

export function formatPath(path: ConfigPath): string {
  return path.join(".")
}

export function getPath(
  document: ReadonlyConfigDocument,
  path: ConfigPath,
): ReadonlyConfigValue | undefined {
  let current: ReadonlyConfigValue | undefined = document

  for (const segment of path) {
    if (!isConfigDocument(current) || !Object.hasOwn(current, segment)) return undefined
    current = current[segment]
  }

  return current
}

/**
 * A path can be written when it is not empty and no segment is a reserved
 * key such as `__proto__`.
 */
export function isWritablePath(path: ConfigPath): boolean {
  return path.length > 0 && !path.some(isReservedKey)
}

/**
 * Writes `value` at `path`, creating intermediate mappings and replacing
 * any non-mapping value found on the way.
 *
 * Returns `false`, writing nothing, when the path is not writable.
 */
export function setPath(document: ConfigDocument, path: ConfigPath, value: ConfigValue): boolean {
  const last = path.at(-1)
  if (last === undefined || !isWritablePath(path)) return false

  let current = document

  for (const segment of path.slice(0, -1)) {
    const next = Object.hasOwn(current, segment) ? current[segment] : undefined

    if (isConfigDocument(next)) {
      current = next
    } else {
      const created: ConfigDocument = {}
      current[segment] = created
      current = created
    }
  }

  current[last] = value
  return true
}

/**
 * Every leaf of a document as a `[path, value]` pair. Arrays and empty
 * mappings count as leaves.
 */
export function leaves(document: ConfigDocument, prefix: ConfigPath = []): [ConfigPath, ConfigValue][] {
  const out: [ConfigPath, ConfigValue][] = []

  for (const [key, value] of Object.entries(document)) {
    const path = [...prefix, key]

    if (isConfigDocument(value) && Object.keys(value).length > 0) {
      out.push(...leaves(value, path))
    } else {
      out.push([path, value])
    }
  }

  return out
}
