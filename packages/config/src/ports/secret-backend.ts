import type { ResolvedSecret } from "./document"

export type GetSecretOptions = {
  signal?: AbortSignal
}

/**
 * Resolves named secret identifiers to decrypted credential bundles.
 */
export interface SecretBackend {
  readonly name: string

  /**
   * Throws when the secret is missing, unreadable or not a flat mapping.
   */
  getSecret(secretName: string, options?: GetSecretOptions): Promise<ResolvedSecret>
}
