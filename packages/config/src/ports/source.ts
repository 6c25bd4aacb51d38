import type { ConfigDocument } from "./document"

/**
 * One local layer of configuration: a YAML document, a dotenv file or the
 * process environment. Merging, coercion and secret expansion happen in the
 * resolver, never here.
 */
export interface ConfigSource {
  /**
   * Provenance name, `<kind>:<location>` or a bare kind: "file:uat.yaml",
   * "dotenv:.env", "env".
   */
  readonly name: string

  /**
   * Nested mapping for file sources, flat `NAME -> string` for the
   * environment and dotenv. A new object on each call.
   */
  load(): Promise<ConfigDocument>
}
