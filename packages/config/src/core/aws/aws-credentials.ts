import type { ReadonlyConfigDocument } from "../../ports/document"
import type { EnvironmentVariables } from "../environment/resolve-environment"

export const DEFAULT_AWS_REGION = "us-east-1"

export type AwsCredentials = {
  accessKeyId?: string
  secretAccessKey?: string
  sessionToken?: string
  region: string
  profile?: string
}

/**
 * Constructor input shared by the AWS SDK v3 clients.
 */
export type AwsClientConfig = {
  region: string
  credentials?: {
    accessKeyId: string
    secretAccessKey: string
    sessionToken?: string
  }
  profile?: string
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value
}

/**
 * Region falls back from `AWS_REGION` to `AWS_DEFAULT_REGION` to us-east-1.
 */
export function getAwsCredentials(env: EnvironmentVariables = process.env): AwsCredentials {
  const accessKeyId = nonEmpty(env.AWS_ACCESS_KEY_ID)
  const secretAccessKey = nonEmpty(env.AWS_SECRET_ACCESS_KEY)
  const sessionToken = nonEmpty(env.AWS_SESSION_TOKEN)
  const profile = nonEmpty(env.AWS_PROFILE)

  return {
    region: nonEmpty(env.AWS_REGION) ?? nonEmpty(env.AWS_DEFAULT_REGION) ?? DEFAULT_AWS_REGION,
    ...(accessKeyId && { accessKeyId }),
    ...(secretAccessKey && { secretAccessKey }),
    ...(sessionToken && { sessionToken }),
    ...(profile && { profile }),
  }
}

/**
 * Same shape as {@link getAwsCredentials}, projected from a resolved
 * `cloud.aws` section.
 */
export function getAwsCredentialsFromConfig(cloudAws: ReadonlyConfigDocument): AwsCredentials {
  const read = (key: string): string | undefined => {
    const value = cloudAws[key]
    return typeof value === "string" ? nonEmpty(value) : undefined
  }

  return getAwsCredentials({
    AWS_ACCESS_KEY_ID: read("access_key_id"),
    AWS_SECRET_ACCESS_KEY: read("secret_access_key"),
    AWS_SESSION_TOKEN: read("session_token"),
    AWS_REGION: read("region"),
    AWS_PROFILE: read("profile"),
  })
}

/**
 * Writes the credentials back into `env` (both region variables included)
 * and returns them.
 */
export function setupAwsEnvironment(env: EnvironmentVariables = process.env): AwsCredentials {
  const credentials = getAwsCredentials(env)

  env.AWS_REGION = credentials.region
  env.AWS_DEFAULT_REGION = credentials.region
  if (credentials.accessKeyId) env.AWS_ACCESS_KEY_ID = credentials.accessKeyId
  if (credentials.secretAccessKey) env.AWS_SECRET_ACCESS_KEY = credentials.secretAccessKey
  if (credentials.sessionToken) env.AWS_SESSION_TOKEN = credentials.sessionToken
  if (credentials.profile) env.AWS_PROFILE = credentials.profile

  return credentials
}

/**
 * Client configuration for `new SSMClient(...)`, `new SecretsManagerClient(...)`
 * and the like. Static credentials are set only when both keys are present;
 * otherwise the SDK's default provider chain (profile, instance role) applies.
 */
export function toAwsClientConfig(credentials: AwsCredentials): AwsClientConfig {
  const { accessKeyId, secretAccessKey, sessionToken, region, profile } = credentials

  return {
    region,
    ...(accessKeyId &&
      secretAccessKey && {
        credentials: { accessKeyId, secretAccessKey, ...(sessionToken && { sessionToken }) },
      }),
    ...(profile && { profile }),
  }
}

export function getAwsClientConfig(env: EnvironmentVariables = process.env): AwsClientConfig {
  return toAwsClientConfig(getAwsCredentials(env))
}
