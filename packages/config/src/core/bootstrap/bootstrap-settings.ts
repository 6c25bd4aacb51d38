import type { LogLevelName } from "@strata/logger"
import { z } from "zod"
import type { KnownSections } from "../../ports/config-accessor"
import type { EnvironmentVariables } from "../environment/resolve-environment"
import { ConfigValidationError } from "../errors/config-error"
import { type BootstrapEnv, bootstrapEnvSchema } from "./schema"

export type BootstrapSettings = {
  configDir: string
  envFile: string
  appName: string
  envPrefix: string
  remote: {
    enabled: boolean
    timeoutMs: number
  }
  allowInsecureFallback: boolean
  requiredSections: Required<KnownSections>
  logging: {
    level: LogLevelName
    prettify: boolean
  }
}

export function mapEnvToSettings(env: BootstrapEnv): BootstrapSettings {
  return {
    configDir: env.CONFIG_DIR,
    envFile: env.CONFIG_ENV_FILE,
    appName: env.CONFIG_APP_NAME,
    envPrefix: env.CONFIG_ENV_PREFIX,
    remote: {
      enabled: env.CONFIG_REMOTE_ENABLED,
      timeoutMs: env.CONFIG_REMOTE_TIMEOUT_MS,
    },
    allowInsecureFallback: env.CONFIG_ALLOW_INSECURE_FALLBACK,
    requiredSections: {
      database: env.CONFIG_REQUIRED_DATABASES,
      cloud: env.CONFIG_REQUIRED_CLOUD,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}

/**
 * @throws ConfigValidationError listing every invalid variable.
 */
export function readBootstrapSettings(env: EnvironmentVariables = process.env): BootstrapSettings {
  const result = bootstrapEnvSchema.safeParse(env)

  if (!result.success) {
    throw new ConfigValidationError(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      { issues: result.error.issues.map((issue) => issue.path.join(".")) },
    )
  }

  return mapEnvToSettings(result.data)
}
