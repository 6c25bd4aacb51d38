import type {
  ConfigDocument,
  ConfigValue,
  ReadonlyConfigDocument,
  ReadonlyConfigValue,
} from "../../ports/document"

const RESERVED_KEYS: ReadonlySet<string> = new Set(["__proto__", "constructor", "prototype"])

/**
 * Keys that would reach an object's prototype chain. Never stored in a
 * document.
 */
export function isReservedKey(key: string): boolean {
  return RESERVED_KEYS.has(key)
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false
  if (Array.isArray(value)) return false

  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

export function isConfigDocument(value: ConfigValue | undefined): value is ConfigDocument
export function isConfigDocument(
  value: ReadonlyConfigValue | undefined,
): value is ReadonlyConfigDocument
export function isConfigDocument(value: unknown): boolean {
  return isPlainObject(value)
}

/**
 * Converts parsed data (YAML, JSON) into a config value, rejecting anything
 * that is not a scalar, array or plain mapping.
 */
export function toConfigValue(raw: unknown, path: string = "$"): ConfigValue {
  if (raw === null || raw === undefined) return null
  if (typeof raw === "string" || typeof raw === "boolean") return raw
  if (typeof raw === "number") return raw
  if (typeof raw === "bigint") return Number(raw)
  if (raw instanceof Date) return raw.toISOString()
  if (Array.isArray(raw)) return raw.map((item, i) => toConfigValue(item, `${path}[${i}]`))
  if (isPlainObject(raw)) return toConfigDocumentEntries(raw, path)

  throw new TypeError(`Unsupported configuration value at ${path}`)
}

/**
 * Like {@link toConfigValue} but requires a mapping at the top. Returns
 * `null` when the input is some other shape.
 */
export function toConfigDocument(raw: unknown): ConfigDocument | null {
  if (!isPlainObject(raw)) return null
  return toConfigDocumentEntries(raw, "$")
}

function toConfigDocumentEntries(raw: Record<string, unknown>, path: string): ConfigDocument {
  const out: ConfigDocument = {}

  for (const [key, value] of Object.entries(raw)) {
    if (isReservedKey(key)) continue
    out[key] = toConfigValue(value, `${path}.${key}`)
  }

  return out
}

function isArray(value: ReadonlyConfigValue): value is readonly ReadonlyConfigValue[] {
  return Array.isArray(value)
}

export function cloneValue(value: ReadonlyConfigValue): ConfigValue {
  if (isArray(value)) return value.map((item) => cloneValue(item))
  if (isConfigDocument(value)) return cloneDocument(value)
  return value
}

export function cloneDocument(document: ReadonlyConfigDocument): ConfigDocument {
  const out: ConfigDocument = {}

  for (const [key, value] of Object.entries(document)) {
    out[key] = cloneValue(value)
  }

  return out
}

/**
 * Deep-freezes a document in place and returns it with a read-only type.
 */
export function deepFreeze(document: ConfigDocument): ReadonlyConfigDocument {
  for (const value of Object.values(document)) {
    freezeValue(value)
  }

  return Object.freeze(document)
}

function freezeValue(value: ConfigValue): void {
  if (Array.isArray(value)) {
    value.forEach(freezeValue)
    Object.freeze(value)
  } else if (isConfigDocument(value)) {
    deepFreeze(value)
  }
}
