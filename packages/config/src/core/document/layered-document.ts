import type { ConfigDocument, ConfigValue, ReadonlyConfigValue } from "../../ports/document"
import { coerceLike } from "./coerce"
import { cloneDocument, cloneValue, isConfigDocument } from "./config-value"
import { type ConfigPath, formatPath, getPath, isWritablePath, leaves, setPath } from "./paths"

export type LayeredSnapshot = Readonly<{
  document: ConfigDocument
  provenance: ReadonlyMap<string, string>
}>

/**
 * Accumulates configuration layers in precedence order (lowest first) and
 * records which source supplied each leaf.
 */
export class LayeredDocument {
  private readonly data: ConfigDocument = {}
  private readonly provenance = new Map<string, string>()

  /**
   * Deep-merges a whole document on top of the current state.
   */
  merge(document: ConfigDocument, source: string): this {
    for (const [path, value] of leaves(document)) {
      this.put(path, cloneValue(value), source)
    }

    return this
  }

  /**
   * Deep-merges a document whose string leaves are coerced to the type of
   * the value they replace.
   */
  overlay(document: ConfigDocument, source: string): this {
    for (const [path, value] of leaves(document)) {
      this.set(path, value, source)
    }

    return this
  }

  /**
   * Writes a single value, coercing strings like {@link coerceLike}.
   */
  set(path: ConfigPath, value: ConfigValue, source: string): this {
    const incoming =
      typeof value === "string" ? coerceLike(getPath(this.data, path), value) : cloneValue(value)

    this.put(path, incoming, source)
    return this
  }

  get(path: ConfigPath): ReadonlyConfigValue | undefined {
    return getPath(this.data, path)
  }

  snapshot(): LayeredSnapshot {
    return {
      document: cloneDocument(this.data),
      provenance: new Map(this.provenance),
    }
  }

  private put(path: ConfigPath, value: ConfigValue, source: string): void {
    if (!isWritablePath(path)) return

    const existing = getPath(this.data, path)

    // an empty mapping merged onto a mapping changes nothing
    if (isConfigDocument(value) && Object.keys(value).length === 0 && isConfigDocument(existing)) {
      return
    }

    const key = formatPath(path)

    this.forgetReplaced(path)
    setPath(this.data, path, value)
    // re-inserted so that iteration follows the order values were written
    this.provenance.delete(key)
    this.provenance.set(key, source)
  }

  /**
   * Drops provenance for values that the write at `path` replaces: the
   * subtree below it and any scalar on the way down.
   */
  private forgetReplaced(path: ConfigPath): void {
    const key = formatPath(path)

    for (const recorded of [...this.provenance.keys()]) {
      if (recorded.startsWith(`${key}.`)) this.provenance.delete(recorded)
    }

    for (let i = 1; i < path.length; i++) {
      const ancestor = path.slice(0, i)
      if (!isConfigDocument(getPath(this.data, ancestor))) {
        this.provenance.delete(formatPath(ancestor))
      }
    }
  }
}
