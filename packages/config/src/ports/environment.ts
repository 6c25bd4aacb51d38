export const environments = ["dev", "uat", "prod"] as const

/**
 * Deployment stage. Selects the override document and the remote path prefix.
 */
export type Environment = (typeof environments)[number]

export const DEFAULT_ENVIRONMENT: Environment = "dev"

/**
 * Variables read, in order, to determine the stage.
 */
export const ENVIRONMENT_VARIABLES = ["ENVIRONMENT", "ENV"] as const

/**
 * Long-form stage names accepted alongside the canonical identifiers.
 */
export const ENVIRONMENT_ALIASES: Readonly<Record<string, Environment>> = {
  dev: "dev",
  development: "dev",
  uat: "uat",
  prod: "prod",
  production: "prod",
}
