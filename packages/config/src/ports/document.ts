export type ConfigScalar = string | number | boolean | null

export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigDocument

/**
 * Nested mapping produced by every configuration layer.
 */
export interface ConfigDocument {
  [key: string]: ConfigValue
}

export type ReadonlyConfigValue =
  | ConfigScalar
  | readonly ReadonlyConfigValue[]
  | ReadonlyConfigDocument

export interface ReadonlyConfigDocument {
  readonly [key: string]: ReadonlyConfigValue
}

/**
 * Connection parameters of one logical database (`database.<name>`).
 *
 * Usual keys: `engine`, `host`, `port`, `database`, `username`, `password`,
 * `pool_size`, `max_overflow`, `pool_timeout`. Credentials either appear
 * inline or come from the secrets backend when the section carries a
 * {@link SecretReference}.
 */
export type DatabaseConfig = ReadonlyConfigDocument

/**
 * Parameters of one cloud service (`cloud.<name>`), e.g. `s3`, `aws`,
 * `secrets_manager`.
 */
export type CloudServiceConfig = ReadonlyConfigDocument

/**
 * Reserved keys of a section whose credentials live in the secrets backend.
 */
export const SECRET_REFERENCE_KEYS = {
  enabled: "use_secrets_manager",
  name: "secret_name",
} as const

/**
 * Decrypted key/value bundle returned by the secrets backend.
 */
export type ResolvedSecret = Readonly<Record<string, string>>

export type SectionKind = "database" | "cloud"

export const SECTION_ROOTS: Readonly<Record<SectionKind, string>> = {
  database: "database",
  cloud: "cloud",
}
