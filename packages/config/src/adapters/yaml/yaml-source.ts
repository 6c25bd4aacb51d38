import fs from "node:fs/promises"
import path from "node:path"
import YAML from "yaml"
import { toConfigDocument } from "../../core/document/config-value"
import { isNotFound } from "../../core/fs/is-not-found"
import type { ConfigDocument } from "../../ports/document"
import type { ConfigSource } from "../../ports/source"

export type YamlSourceOptions = {
  /**
   * Path to the YAML document, absolute or relative to `cwd`.
   */
  file: string

  /**
   * - `true`: a missing file throws.
   * - `false`: a missing file loads as an empty document.
   */
  required: boolean

  /**
   * @default process.cwd()
   */
  cwd?: string
}

export class YamlDocumentError extends Error {
  constructor(
    message: string,
    readonly file: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "YamlDocumentError"
  }
}

/**
 * Loads a YAML mapping. An empty file is an empty document; a file whose top
 * level is not a mapping is rejected.
 */
export class YamlSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: YamlSourceOptions) {
    this.name = `file:${path.basename(opts.file)}`
  }

  get filePath(): string {
    return path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)
  }

  async load(): Promise<ConfigDocument> {
    let content: string

    try {
      content = await fs.readFile(this.filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isNotFound(err)) return {}
      throw err
    }

    let parsed: unknown
    try {
      parsed = YAML.parse(content)
    } catch (err) {
      throw new YamlDocumentError(`Malformed YAML in ${this.filePath}`, this.filePath, {
        cause: err,
      })
    }

    if (parsed === null || parsed === undefined) return {}

    const document = toConfigDocument(parsed)
    if (document === null) {
      throw new YamlDocumentError(
        `Expected a mapping at the top of ${this.filePath}`,
        this.filePath,
      )
    }

    return document
  }
}
