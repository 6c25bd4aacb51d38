import type {
  CloudServiceConfig,
  DatabaseConfig,
  ReadonlyConfigDocument,
  ReadonlyConfigValue,
  SectionKind,
} from "./document"
import type { Environment } from "./environment"

/**
 * Names the application expects to find, checked at startup.
 */
export type KnownSections<TDatabase extends string = string, TCloud extends string = string> =
  Readonly<{
    database?: readonly TDatabase[]
    cloud?: readonly TCloud[]
  }>

/**
 * Read side of a configuration resolver, as consumed by application code.
 *
 * Every returned mapping is a deep-frozen snapshot.
 */
export interface ConfigAccessor<TDatabase extends string = string, TCloud extends string = string> {
  getEnvironment(): Environment

  /**
   * Whole document with every database and cloud section's secrets expanded.
   */
  getConfig(): Promise<ReadonlyConfigDocument>
  getConfig(key: string): Promise<ReadonlyConfigValue | undefined>

  getDbConfig(name: TDatabase): Promise<DatabaseConfig>
  getCloudConfig(name: TCloud): Promise<CloudServiceConfig>

  /**
   * Names present under `database` or `cloud`.
   */
  sectionNames(kind: SectionKind): Promise<string[]>

  /**
   * Source that supplied the value at a dotted path, e.g. "file:uat.yaml",
   * "env:AWS_REGION", "remote:ssm:/uat/risk-api/", "secret:riskdb-creds".
   */
  explain(path: string): Promise<string | undefined>

  sourcesUsed(): Promise<string[]>

  validateSections(sections?: KnownSections): Promise<void>
}
