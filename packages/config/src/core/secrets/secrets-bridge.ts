import { createNullLogger, type Logger } from "@strata/logger"
import type { ResolvedSecret } from "../../ports/document"
import type { SecretBackend } from "../../ports/secret-backend"
import { SecretResolutionError } from "../errors/config-error"

export const DEFAULT_SECRET_TIMEOUT_MS = 3_000

export type SecretsBridgeDeps = {
  backend: SecretBackend
  logger?: Logger
}

export type SecretsBridgeOptions = {
  /**
   * Time budget for one backend call.
   * @default 3000
   */
  timeoutMs?: number
}

/**
 * Resolves secret identifiers through the injected backend.
 *
 * Nothing is cached across calls; use {@link SecretsBridge.session} to
 * share lookups within one resolution.
 */
export class SecretsBridge {
  private readonly logger: Logger
  private readonly timeoutMs: number

  constructor(
    private readonly deps: SecretsBridgeDeps,
    options: SecretsBridgeOptions = {},
  ) {
    this.logger = deps.logger ?? createNullLogger()
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SECRET_TIMEOUT_MS
  }

  /**
   * @throws SecretResolutionError wrapping whatever the backend threw.
   */
  async resolveSecret(secretName: string): Promise<ResolvedSecret> {
    const started = Date.now()

    try {
      const secret = await this.deps.backend.getSecret(secretName, {
        signal: AbortSignal.timeout(this.timeoutMs),
      })

      this.logger.debug("Secret resolved", {
        source: `secret:${secretName}`,
        fields: Object.keys(secret).length,
        durationMs: Date.now() - started,
      })

      return secret
    } catch (err) {
      throw new SecretResolutionError(
        `Failed to resolve secret '${secretName}' from ${this.deps.backend.name}`,
        { secretName, cause: err },
      )
    }
  }

  session(): SecretSession {
    return new SecretSession(this)
  }
}

/**
 * Per-resolution memo: the same secret name is fetched at most once, even
 * when several sections reference it concurrently.
 */
export class SecretSession {
  private readonly lookups = new Map<string, Promise<ResolvedSecret>>()

  constructor(private readonly bridge: SecretsBridge) {}

  resolve(secretName: string): Promise<ResolvedSecret> {
    const existing = this.lookups.get(secretName)
    if (existing) return existing

    const lookup = this.bridge.resolveSecret(secretName)
    this.lookups.set(secretName, lookup)
    return lookup
  }
}
