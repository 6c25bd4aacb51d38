import { createNullLogger, type Logger } from "@strata/logger"
import { DotenvSource } from "../../adapters/dotenv/dotenv-source"
import { EnvSource } from "../../adapters/env/env-source"
import { type ConfigPath, parsePath } from "../document/paths"
import type { EnvironmentVariables } from "../environment/resolve-environment"
import { DEFAULT_ENV_MAPPINGS, DEFAULT_ENV_PREFIX, type EnvMapping, nestedOverridePath } from "./env-mappings"

export type EnvConfigOptions = {
  /**
   * Dotenv file, absolute or relative to `cwd`. Skipped when omitted or
   * missing.
   */
  envFile?: string

  cwd?: string

  /**
   * Target environment. File values are copied in for keys it does not
   * already define.
   *
   * @default process.env
   */
  env?: EnvironmentVariables

  mappings?: readonly EnvMapping[]

  prefix?: string

  logger?: Logger
}

/**
 * Loads the dotenv file into `env` without overwriting existing variables,
 * then returns the variables relevant to configuration: those named in the
 * mapping table and those carrying the nested-override prefix.
 */
export async function loadEnvConfig(options: EnvConfigOptions = {}): Promise<Record<string, string>> {
  const env = options.env ?? process.env
  const logger = options.logger ?? createNullLogger()

  if (options.envFile !== undefined) {
    const dotenv = new DotenvSource({ file: options.envFile, cwd: options.cwd })
    const applied = await dotenv.applyTo(env)

    logger.debug("Dotenv file loaded", { source: dotenv.name, applied: applied.length })
  }

  const mappings = options.mappings ?? DEFAULT_ENV_MAPPINGS
  const view = await new EnvSource({
    env,
    names: mappings.map((m) => m.variable),
    prefix: options.prefix ?? DEFAULT_ENV_PREFIX,
  }).load()

  const flat: Record<string, string> = {}
  for (const [key, value] of Object.entries(view)) {
    if (typeof value === "string") flat[key] = value
  }

  return flat
}

export type EnvOverride = Readonly<{
  variable: string
  path: ConfigPath
  value: string
}>

/**
 * Turns the flat environment view into path overrides, in the order they
 * must be applied: the mapping table first (row order), then nested
 * overrides sorted by variable name.
 */
export function envOverrides(
  view: Readonly<Record<string, string>>,
  mappings: readonly EnvMapping[] = DEFAULT_ENV_MAPPINGS,
  prefix: string = DEFAULT_ENV_PREFIX,
): EnvOverride[] {
  const overrides: EnvOverride[] = []

  for (const mapping of mappings) {
    const value = view[mapping.variable]
    if (value === undefined) continue
    overrides.push({ variable: mapping.variable, path: parsePath(mapping.path), value })
  }

  for (const variable of Object.keys(view).sort()) {
    const path = nestedOverridePath(variable, prefix)
    const value = view[variable]
    if (path === undefined || value === undefined) continue
    overrides.push({ variable, path, value })
  }

  return overrides
}
