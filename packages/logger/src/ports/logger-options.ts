import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior. Adapters must honor them but
 * are free to choose how.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Any log entries below this level are ignored.
   */
  level: LogLevelName

  /**
   * Whether to pretty-print log output for human readability.
   * Intended for local development only.
   */
  prettify?: boolean

  /**
   * Meta keys whose values are replaced before an entry is written.
   *
   * Matched at the top level of the entry and one level below it
   * (`password` also covers `db.password`).
   *
   * @default DEFAULT_REDACTED_KEYS
   */
  redact?: readonly string[]
}

/**
 * Keys that carry credential material in resolved configuration sections.
 */
export const DEFAULT_REDACTED_KEYS = [
  "password",
  "secret",
  "token",
  "access_key_id",
  "secret_access_key",
  "session_token",
  "jwt_secret_key",
  "encryption_key",
] as const
