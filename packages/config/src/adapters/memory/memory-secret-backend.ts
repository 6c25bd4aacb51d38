import { parseSecretPayload } from "../../core/secrets/parse-secret-payload"
import type { ResolvedSecret } from "../../ports/document"
import type { GetSecretOptions, SecretBackend } from "../../ports/secret-backend"

/**
 * In-memory secret backend for local development and tests. Values are
 * stored as JSON strings, the same as in Secrets Manager.
 */
export class MemorySecretBackend implements SecretBackend {
  readonly name = "memory"
  private readonly store = new Map<string, string>()
  private readonly lookups = new Map<string, number>()

  constructor(secrets: Readonly<Record<string, Readonly<Record<string, string>>>> = {}) {
    for (const [name, value] of Object.entries(secrets)) {
      this.set(name, value)
    }
  }

  set(secretName: string, value: Readonly<Record<string, string>> | string): void {
    this.store.set(secretName, typeof value === "string" ? value : JSON.stringify(value))
  }

  delete(secretName: string): void {
    this.store.delete(secretName)
  }

  /**
   * Number of `getSecret` calls made for a name.
   */
  lookupCount(secretName: string): number {
    return this.lookups.get(secretName) ?? 0
  }

  async getSecret(secretName: string, options: GetSecretOptions = {}): Promise<ResolvedSecret> {
    this.lookups.set(secretName, this.lookupCount(secretName) + 1)
    options.signal?.throwIfAborted()

    const payload = this.store.get(secretName)
    if (payload === undefined) {
      throw new Error(`Secret not found: ${secretName}`)
    }

    return parseSecretPayload(secretName, payload)
  }
}
