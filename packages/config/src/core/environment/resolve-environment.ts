import { createNullLogger, type Logger } from "@strata/logger"
import {
  DEFAULT_ENVIRONMENT,
  ENVIRONMENT_ALIASES,
  ENVIRONMENT_VARIABLES,
  type Environment,
  environments,
} from "../../ports/environment"

export type EnvironmentVariables = Record<string, string | undefined>

export function isEnvironment(value: string): value is Environment {
  return environments.some((env) => env === value)
}

/**
 * Maps a raw stage name to an {@link Environment}, or `undefined` when it is
 * not recognised. Case-insensitive; accepts the long-form aliases.
 */
export function normalizeEnvironment(raw: string): Environment | undefined {
  const key = raw.trim().toLowerCase()
  return Object.hasOwn(ENVIRONMENT_ALIASES, key) ? ENVIRONMENT_ALIASES[key] : undefined
}

/**
 * Determines the deployment stage from `ENVIRONMENT`, then `ENV`.
 *
 * Never throws: an unset indicator yields the default stage, an
 * unrecognised one is logged as a warning and yields the default stage.
 */
export function resolveEnvironment(
  env: EnvironmentVariables = process.env,
  logger: Logger = createNullLogger(),
): Environment {
  for (const variable of ENVIRONMENT_VARIABLES) {
    const raw = env[variable]
    if (raw === undefined || raw.trim() === "") continue

    const environment = normalizeEnvironment(raw)

    if (environment === undefined) {
      logger.warn("Unrecognised environment, using default", {
        variable,
        value: raw,
        env: DEFAULT_ENVIRONMENT,
      })
      return DEFAULT_ENVIRONMENT
    }

    logger.debug("Environment resolved", { variable, env: environment })
    return environment
  }

  logger.debug("Environment not set, using default", { env: DEFAULT_ENVIRONMENT })
  return DEFAULT_ENVIRONMENT
}
