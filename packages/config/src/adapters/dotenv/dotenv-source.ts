import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { EnvironmentVariables } from "../../core/environment/resolve-environment"
import { isNotFound } from "../../core/fs/is-not-found"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Absolute, or relative to `cwd`.
   *
   * @example ".env", ".env.local"
   */
  file: string

  /**
   * A missing file throws when set, and loads as `{}` otherwise.
   *
   * @default false
   */
  required?: boolean

  /**
   * @default process.cwd()
   */
  cwd?: string
}

/**
 * Local `.env` file. Values are always strings.
 */
export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  get filePath(): string {
    return path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)
  }

  async load(): Promise<Record<string, string>> {
    let content: string

    try {
      content = await fs.readFile(this.filePath, "utf-8")
    } catch (err) {
      if (!isNotFound(err)) throw err
      if (this.opts.required) {
        throw new Error(`Dotenv file not found: ${this.filePath}`, { cause: err })
      }
      return {}
    }

    return parse(content)
  }

  /**
   * Copies file values into `env` for names it does not define yet and
   * returns the names that were set. Variables from the real environment
   * always win.
   */
  async applyTo(env: EnvironmentVariables): Promise<string[]> {
    const values = await this.load()
    const applied: string[] = []

    for (const [key, value] of Object.entries(values)) {
      if (env[key] !== undefined) continue
      env[key] = value
      applied.push(key)
    }

    return applied
  }
}
