import type { ConfigDocument } from "../../ports/document"
import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /**
   * Variables starting with this prefix are included.
   */
  prefix?: string

  /**
   * Variables included by exact name.
   */
  names?: readonly string[]

  env?: Record<string, string | undefined>
}

/**
 * Flat view of the live process environment.
 *
 * With neither `prefix` nor `names`, every defined variable is returned.
 * Names are kept as-is.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string | undefined
  private readonly names: ReadonlySet<string> | undefined
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.names = options.names ? new Set(options.names) : undefined
    this.env = options.env ?? process.env
  }

  async load(): Promise<ConfigDocument> {
    const filtered: ConfigDocument = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value === undefined || !this.includes(key)) continue
      filtered[key] = value
    }

    return filtered
  }

  private includes(key: string): boolean {
    if (this.prefix === undefined && this.names === undefined) return true

    return (
      (this.names?.has(key) ?? false) ||
      (this.prefix !== undefined && this.prefix !== "" && key.startsWith(this.prefix))
    )
  }
}
