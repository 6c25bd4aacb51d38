import path from "node:path"
import { SecretsManagerClient } from "@aws-sdk/client-secrets-manager"
import { SSMClient } from "@aws-sdk/client-ssm"
import { createPinoLogger, type Logger } from "@strata/logger"
import { DisabledRemoteSource } from "../../adapters/disabled/disabled-remote-source"
import { AwsSecretsManagerBackend } from "../../adapters/secrets-manager/aws-secrets-manager-backend"
import { ParameterStoreSource } from "../../adapters/ssm/parameter-store-source"
import type { KnownSections } from "../../ports/config-accessor"
import type { ReadonlyConfigDocument } from "../../ports/document"
import type { RemoteConfigSource } from "../../ports/remote-source"
import type { SecretBackend } from "../../ports/secret-backend"
import {
  type AwsCredentials,
  getAwsCredentials,
  getAwsCredentialsFromConfig,
  toAwsClientConfig,
} from "../aws/aws-credentials"
import { type BootstrapSettings, readBootstrapSettings } from "../bootstrap/bootstrap-settings"
import { isConfigDocument } from "../document/config-value"
import { getPath } from "../document/paths"
import { type EnvironmentVariables, resolveEnvironment } from "../environment/resolve-environment"
import type { EnvMapping } from "../layers/env-mappings"
import { loadEnvConfig } from "../layers/load-env-config"
import { ConfigResolver } from "./config-resolver"

export type BootstrapOverrides = Partial<
  Pick<BootstrapSettings, "configDir" | "envFile" | "appName" | "envPrefix" | "allowInsecureFallback">
> & {
  remote?: Partial<BootstrapSettings["remote"]>
  logging?: Partial<BootstrapSettings["logging"]>
  requiredSections?: KnownSections
}

export type CreateConfigResolverOptions<
  TDatabase extends string = string,
  TCloud extends string = string,
> = {
  /**
   * @default process.cwd()
   */
  cwd?: string

  /**
   * @default process.env
   */
  env?: EnvironmentVariables

  /**
   * Overrides for the settings read from `CONFIG_*` variables.
   */
  settings?: BootstrapOverrides

  /**
   * Built from the `LOG_*` settings when omitted.
   */
  logger?: Logger

  /**
   * Used instead of the parameter store when the remote source is enabled.
   */
  remoteSource?: RemoteConfigSource
  ssmClient?: SSMClient

  secretBackend?: SecretBackend
  secretsManagerClient?: SecretsManagerClient

  envMappings?: readonly EnvMapping[]

  sections?: KnownSections<TDatabase, TCloud>
}

function mergeSettings(
  base: BootstrapSettings,
  overrides: BootstrapOverrides = {},
): BootstrapSettings {
  return {
    ...base,
    ...(overrides.configDir !== undefined && { configDir: overrides.configDir }),
    ...(overrides.envFile !== undefined && { envFile: overrides.envFile }),
    ...(overrides.appName !== undefined && { appName: overrides.appName }),
    ...(overrides.envPrefix !== undefined && { envPrefix: overrides.envPrefix }),
    ...(overrides.allowInsecureFallback !== undefined && {
      allowInsecureFallback: overrides.allowInsecureFallback,
    }),
    remote: { ...base.remote, ...overrides.remote },
    requiredSections: {
      database: overrides.requiredSections?.database ?? base.requiredSections.database,
      cloud: overrides.requiredSections?.cloud ?? base.requiredSections.cloud,
    },
    logging: { ...base.logging, ...overrides.logging },
  }
}

/**
 * Region and prefix for Secrets Manager come from `cloud.secrets_manager`,
 * credentials from `cloud.aws`, then the environment.
 */
function secretsManagerSettings(
  document: ReadonlyConfigDocument,
  env: EnvironmentVariables,
): { credentials: AwsCredentials; prefix?: string } {
  const aws = getPath(document, ["cloud", "aws"])
  const section = getPath(document, ["cloud", "secrets_manager"])
  // the environment overlay has already copied AWS_* into cloud.aws
  const credentials = isConfigDocument(aws) ? getAwsCredentialsFromConfig(aws) : getAwsCredentials(env)

  if (!isConfigDocument(section)) return { credentials }

  const { region, prefix } = section

  return {
    credentials: typeof region === "string" && region !== "" ? { ...credentials, region } : credentials,
    ...(typeof prefix === "string" && prefix !== "" && { prefix }),
  }
}

/**
 * Builds a resolver from the `CONFIG_*` variables.
 *
 * Loads the dotenv file first, so it can set the stage and the resolver's
 * own settings, then wires the remote source and the secret backend.
 *
 * @example
 * ```ts
 * const config = await createConfigResolver({
 *   sections: { database: ["riskdb"], cloud: ["s3"] } as const,
 * })
 * await config.validateSections()
 * const riskdb = await config.getDbConfig("riskdb")
 * ```
 */
export async function createConfigResolver<
  TDatabase extends string = string,
  TCloud extends string = string,
>(
  options: CreateConfigResolverOptions<TDatabase, TCloud> = {},
): Promise<ConfigResolver<TDatabase, TCloud>> {
  const env = options.env ?? process.env
  const cwd = options.cwd ?? process.cwd()
  const envFile = options.settings?.envFile ?? env.CONFIG_ENV_FILE ?? ".env"

  await loadEnvConfig({ envFile, cwd, env })

  const settings = mergeSettings(readBootstrapSettings(env), options.settings)
  const logger =
    options.logger ??
    createPinoLogger(
      {},
      { level: settings.logging.level, prettify: settings.logging.prettify },
      { service: "strata-config" },
    )
  const environment = resolveEnvironment(env, logger)

  const remote = settings.remote.enabled
    ? (options.remoteSource ??
      new ParameterStoreSource({
        client: options.ssmClient ?? new SSMClient(toAwsClientConfig(getAwsCredentials(env))),
      }))
    : new DisabledRemoteSource()

  const secretBackend =
    options.secretBackend ??
    ((document: ReadonlyConfigDocument): SecretBackend => {
      const { credentials, prefix } = secretsManagerSettings(document, env)

      return new AwsSecretsManagerBackend(
        {
          client:
            options.secretsManagerClient ?? new SecretsManagerClient(toAwsClientConfig(credentials)),
        },
        { prefix },
      )
    })

  logger.debug("Config resolver created", {
    env: environment,
    app: settings.appName,
    remote: remote.name,
    configDir: settings.configDir,
  })

  return new ConfigResolver<TDatabase, TCloud>(
    { remote, secretBackend, logger },
    {
      configDir: path.resolve(cwd, settings.configDir),
      cwd,
      environment,
      env,
      envPrefix: settings.envPrefix,
      envMappings: options.envMappings,
      appName: settings.appName,
      remoteTimeoutMs: settings.remote.timeoutMs,
      secretTimeoutMs: settings.remote.timeoutMs,
      allowInsecureFallback: settings.allowInsecureFallback,
      sections: options.sections,
      requiredSections: settings.requiredSections,
    },
  )
}
