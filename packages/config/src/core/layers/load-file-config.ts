import { YamlSource } from "../../adapters/yaml/yaml-source"
import type { ConfigDocument } from "../../ports/document"
import type { Environment } from "../../ports/environment"
import { deepMerge } from "../document/deep-merge"
import { ConfigLoadError } from "../errors/config-error"
import { isNotFound } from "../fs/is-not-found"

export const BASE_DOCUMENT = "base.yaml"

export function overrideDocumentName(environment: Environment): string {
  return `${environment}.yaml`
}

export type FileConfigOptions = {
  environment: Environment

  /**
   * Directory holding `base.yaml` and `<environment>.yaml`, absolute or
   * relative to `cwd`.
   */
  configDir: string

  /**
   * @default process.cwd()
   */
  cwd?: string
}

export type FileLayer = Readonly<{
  source: string
  document: ConfigDocument
}>

/**
 * Loads the base document and the environment override document, lowest
 * precedence first.
 *
 * @throws ConfigLoadError when the base document is missing or malformed,
 * or when the override document exists but is malformed.
 */
export async function loadFileLayers(options: FileConfigOptions): Promise<FileLayer[]> {
  const base = new YamlSource({
    file: `${options.configDir}/${BASE_DOCUMENT}`,
    required: true,
    cwd: options.cwd,
  })
  const override = new YamlSource({
    file: `${options.configDir}/${overrideDocumentName(options.environment)}`,
    required: false,
    cwd: options.cwd,
  })

  const load = async (source: YamlSource): Promise<FileLayer> => {
    try {
      return { source: source.name, document: await source.load() }
    } catch (err) {
      const message = isNotFound(err)
        ? `Base configuration document not found: ${source.filePath}`
        : `Failed to load configuration document ${source.filePath}`

      throw new ConfigLoadError(message, {
        file: source.filePath,
        environment: options.environment,
        cause: err,
      })
    }
  }

  return [await load(base), await load(override)]
}

/**
 * Base document with the environment override deep-merged on top.
 */
export async function loadFileConfig(options: FileConfigOptions): Promise<ConfigDocument> {
  const [base, override] = await loadFileLayers(options)

  return deepMerge(base?.document ?? {}, override?.document ?? {})
}
