import type { Environment } from "../../ports/environment"
import type { SectionKind } from "../../ports/document"
import type { ConfigErrorCode, ErrorContext, SerializedError } from "../../ports/error"

export type ConfigErrorOptions<C extends ConfigErrorCode = ConfigErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

export class ConfigError<C extends ConfigErrorCode = ConfigErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: ConfigErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

/**
 * The base document is missing or unparseable, or an override document is
 * malformed. Fatal: surfaced on the first access of any category.
 */
export class ConfigLoadError extends ConfigError<"config_load_failed"> {
  constructor(
    message: string,
    options: { file?: string; environment?: Environment; cause?: unknown } = {},
  ) {
    super(message, {
      code: "config_load_failed",
      context: { file: options.file, environment: options.environment },
      cause: options.cause,
    })
  }
}

export type SectionRef = Readonly<{ kind: SectionKind; name: string }>

export class UnknownConfigSectionError extends ConfigError<"unknown_config_section"> {
  readonly missing: readonly SectionRef[]

  constructor(missing: readonly SectionRef[], available: readonly string[] = []) {
    const [first] = missing
    const message =
      missing.length === 1 && first
        ? `Unknown ${first.kind} configuration section '${first.name}'` +
          (available.length > 0 ? ` (available: ${available.join(", ")})` : "")
        : `Unknown configuration sections: ${missing.map((m) => `${m.kind}.${m.name}`).join(", ")}`

    super(message, {
      code: "unknown_config_section",
      context: { missing, available },
    })
    this.missing = missing
  }
}

/**
 * Internal: the remote store could not be read. Logged and absorbed by the
 * resolver, never thrown to callers.
 */
export class RemoteStoreUnavailableError extends ConfigError<"remote_store_unavailable"> {
  constructor(location: string, cause: unknown) {
    super(`Remote configuration store unavailable at ${location}`, {
      code: "remote_store_unavailable",
      context: { location },
      cause,
    })
  }
}

export class SecretResolutionError extends ConfigError<"secret_resolution_failed"> {
  readonly secretName: string | undefined

  constructor(
    message: string,
    options: { secretName?: string; section?: string; cause?: unknown } = {},
  ) {
    super(message, {
      code: "secret_resolution_failed",
      context: { secretName: options.secretName, section: options.section },
      cause: options.cause,
    })
    this.secretName = options.secretName
  }
}

export class ConfigValidationError extends ConfigError<"config_validation_failed"> {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, { code: "config_validation_failed", context, cause })
  }
}

export function isConfigError(err: unknown): err is ConfigError {
  return err instanceof ConfigError
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * ConfigError instances keep their code and context; other errors get the
 * code "unknown"; non-Error values are wrapped.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof ConfigError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack !== undefined && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack !== undefined && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
