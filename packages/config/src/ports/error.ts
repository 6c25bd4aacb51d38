export type ConfigErrorCode =
  | "config_load_failed"
  | "unknown_config_section"
  | "remote_store_unavailable"
  | "secret_resolution_failed"
  | "config_validation_failed"

/**
 * Structured metadata attached to errors (file paths, section names, etc.).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

/**
 * Serialized error shape for logging and CLI output.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
