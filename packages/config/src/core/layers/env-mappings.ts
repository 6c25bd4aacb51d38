import type { ConfigPath } from "../document/paths"

/**
 * Binds one environment variable to a nested configuration path.
 */
export type EnvMapping = Readonly<{
  variable: string
  path: string
}>

export const DEFAULT_ENV_PREFIX = "CONFIG__"

/**
 * Fixed variable-to-path table. Later rows win when two variables target
 * the same path, so `AWS_REGION` beats `AWS_DEFAULT_REGION`.
 */
export const DEFAULT_ENV_MAPPINGS: readonly EnvMapping[] = [
  { variable: "AWS_ACCESS_KEY_ID", path: "cloud.aws.access_key_id" },
  { variable: "AWS_SECRET_ACCESS_KEY", path: "cloud.aws.secret_access_key" },
  { variable: "AWS_SESSION_TOKEN", path: "cloud.aws.session_token" },
  { variable: "AWS_DEFAULT_REGION", path: "cloud.aws.region" },
  { variable: "AWS_REGION", path: "cloud.aws.region" },
  { variable: "AWS_PROFILE", path: "cloud.aws.profile" },
  { variable: "JWT_SECRET_KEY", path: "security.jwt_secret_key" },
  { variable: "ENCRYPTION_KEY", path: "security.encryption_key" },
  { variable: "LOG_LEVEL", path: "logging.level" },
]

/**
 * `CONFIG__DATABASE__RISKDB__PORT` → `["database", "riskdb", "port"]`.
 *
 * Returns `undefined` for names without the prefix or with an empty segment.
 */
export function nestedOverridePath(variable: string, prefix: string): ConfigPath | undefined {
  if (prefix === "" || !variable.startsWith(prefix)) return undefined

  const segments = variable.slice(prefix.length).split("__")
  if (segments.some((segment) => segment === "")) return undefined

  return segments.map((segment) => segment.toLowerCase())
}
